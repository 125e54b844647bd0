export type { ProductRepository } from './product.repository.js';
export type { OrderRepository } from './order.repository.js';
export type { JournalRepository } from './journal.repository.js';
