export { InMemoryProductRepository } from './product.repository.js';
export { InMemoryOrderRepository } from './order.repository.js';
export { InMemoryJournalRepository } from './journal.repository.js';
