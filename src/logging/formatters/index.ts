export type { LogFormatter } from './types.js';
export { LineFormatter } from './line.js';
export { JsonFormatter } from './json.js';
export { KeyValueFormatter } from './keyvalue.js';
