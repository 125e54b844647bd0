/**
 * Checkout Flow Example
 *
 * Walks one catalog through the engine:
 * - Placing orders, including one the stock cannot cover
 * - Paying, delivering and cancelling
 * - Reading low stock, sales metrics and the stock journal
 */

import {
  Cart,
  CommerceEngine,
  CorrelateMiddleware,
  InMemoryJournalRepository,
  InMemoryOrderRepository,
  InMemoryProductRepository,
  JsonFormatter,
  RuntimeMiddleware,
  configure,
  createLogger,
  type RequestContext,
} from '../src/index.js';

// =============================================================================
// Setup
// =============================================================================

configure((config) => {
  config.middlewares.register(CorrelateMiddleware);
  config.middlewares.register(RuntimeMiddleware);
  config.logger = { formatter: new JsonFormatter() };
});

const engine = new CommerceEngine({
  products: new InMemoryProductRepository([
    { id: 'WIDGET', name: 'Widget', price: 2.5, availableQuantity: 5, lowStockThreshold: 2 },
    { id: 'GADGET', name: 'Gadget', price: 19.99, availableQuantity: 12, category: 'Electronics' },
  ]),
  orders: new InMemoryOrderRepository(),
  journal: new InMemoryJournalRepository(),
  logger: createLogger(),
});

const customer: RequestContext = { actor: 'alice', role: 'customer' };
const staff: RequestContext = { actor: 'staff-1', role: 'staff' };

// =============================================================================
// Orders
// =============================================================================

async function placeOrders(): Promise<string | undefined> {
  console.log('\n=== Placing orders ===\n');

  const cart = Cart.empty().add('WIDGET', 4).add('GADGET');
  const placed = await engine.placeOrder(customer, 'alice', cart);

  placed
    .on('success', (r) => {
      if (r.success) console.log(`Placed ${r.value.id}, total ${r.value.total}`);
    })
    .on('failed', (r) => {
      if (r.failed) console.log(`Rejected: ${r.reason}`);
    });

  const tooMany = await engine.placeOrder(customer, 'alice', { WIDGET: 2 });
  if (tooMany.failed) {
    console.log(`Second order ${tooMany.code}: ${tooMany.reason}`);
  }

  return placed.success ? placed.value.id : undefined;
}

async function reportStock(): Promise<void> {
  const low = await engine.lowStock(staff);
  if (low.success) {
    console.log('Low stock:', low.value.map((p) => `${p.id}=${p.availableQuantity}`).join(', ') || 'none');
  }
}

// =============================================================================
// Main
// =============================================================================

async function main() {
  try {
    const orderId = await placeOrders();
    await reportStock();

    if (orderId) {
      console.log('\n=== Cancelling ===\n');
      const cancelled = await engine.cancel(customer, orderId);
      console.log(`Order ${orderId} is ${cancelled.success ? cancelled.value.status : cancelled.reason}`);
      await reportStock();
    }

    const gadgets = await engine.placeOrder(customer, 'alice', { GADGET: 2 });
    if (gadgets.success) {
      await engine.markPaid(staff, gadgets.value.id);
      await engine.markDelivered(staff, gadgets.value.id);
    }

    const metrics = await engine.metrics(staff);
    if (metrics.success) {
      console.log('\nRevenue:', metrics.value.totalRevenue, 'completion:', metrics.value.completionRate);
    }

    const history = await engine.stockHistory(staff, { productId: 'WIDGET' });
    if (history.success) {
      for (const entry of history.value) {
        console.log(`${entry.kind} ${entry.quantityDelta} -> ${entry.resultingQuantity} by ${entry.actor}`);
      }
    }

    console.log('\n✓ Checkout flow completed\n');
  } catch (error) {
    console.error('Example failed:', error);
    process.exit(1);
  }
}

// Uncomment to run:
// main();

export { engine, main };
