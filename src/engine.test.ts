/**
 * CommerceEngine Tests
 */

import { Writable } from 'node:stream';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { configure, resetConfiguration } from './config.js';
import type { RequestContext } from './domain/types.js';
import { CommerceEngine } from './engine.js';
import { Logger } from './logging/logger.js';
import { CorrelateMiddleware, RuntimeMiddleware } from './middleware/index.js';
import {
  InMemoryJournalRepository,
  InMemoryOrderRepository,
  InMemoryProductRepository,
} from './persistence/memory/index.js';

const alice: RequestContext = { actor: 'alice', role: 'customer' };
const staff: RequestContext = { actor: 'staff-1', role: 'staff', correlationId: 'req-1' };
const placedAt = new Date('2024-03-01T10:00:00Z');

/**
 * Hold the next saveOrder call open until `resume` is called, then commit it
 * or fail it.
 */
function pauseNextSave(repository: InMemoryOrderRepository, outcome: 'commit' | 'fail') {
  let entered: () => void = () => undefined;
  let resume: () => void = () => undefined;
  const saving = new Promise<void>((resolve) => {
    entered = resolve;
  });
  const resumed = new Promise<void>((resolve) => {
    resume = resolve;
  });
  const save = repository.saveOrder.bind(repository);

  vi.spyOn(repository, 'saveOrder').mockImplementationOnce(async (order) => {
    entered();
    await resumed;
    if (outcome === 'fail') {
      throw new Error('db down');
    }
    return save(order);
  });

  return { saving, resume };
}

describe('CommerceEngine', () => {
  let products: InMemoryProductRepository;
  let orders: InMemoryOrderRepository;
  let engine: CommerceEngine;

  beforeEach(() => {
    products = new InMemoryProductRepository([
      { id: 'WIDGET', name: 'Widget', price: 2.5, availableQuantity: 5, lowStockThreshold: 2 },
    ]);
    orders = new InMemoryOrderRepository();
    engine = new CommerceEngine({
      products,
      orders,
      journal: new InMemoryJournalRepository(),
      logger: new Logger({ enabled: false }),
      now: () => placedAt,
    });
  });

  afterEach(() => {
    resetConfiguration();
  });

  describe('stock and low-stock scenario', () => {
    it('should flag a product after an order and clear it on cancellation', async () => {
      const placed = await engine.placeOrder(alice, 'alice', { WIDGET: 4 });
      const order = placed.unwrap();

      expect(order.total).toBe(10);
      expect((await engine.peek(alice, 'WIDGET')).unwrap()).toBe(1);
      expect((await engine.lowStock(staff)).unwrap().map((p) => p.id)).toEqual(['WIDGET']);

      const cancelled = await engine.cancel(alice, order.id);

      expect(cancelled.unwrap().status).toBe('CANCELLED');
      expect((await engine.peek(alice, 'WIDGET')).unwrap()).toBe(5);
      expect((await engine.lowStock(staff)).unwrap()).toEqual([]);
    });

    it('should reject an order beyond the stock and keep it unchanged', async () => {
      const result = await engine.placeOrder(alice, 'alice', { WIDGET: 6 });

      expect(result.failed).toBe(true);
      if (result.failed) expect(result.code).toBe('INSUFFICIENT_STOCK');
      expect((await engine.peek(alice, 'WIDGET')).unwrap()).toBe(5);
    });

    it('should restock and journal who did it', async () => {
      const restocked = await engine.restock(staff, 'WIDGET', 10);

      expect(restocked.unwrap()).toBe(15);

      const history = (await engine.stockHistory(staff, { productId: 'WIDGET' })).unwrap();
      expect(history.map((e) => [e.kind, e.quantityDelta, e.resultingQuantity, e.actor])).toEqual([
        ['RESTOCK', 10, 15, 'staff-1'],
      ]);
    });
  });

  describe('orders', () => {
    it('should walk an order to DELIVERED and report it in metrics', async () => {
      const order = (await engine.placeOrder(alice, 'alice', { WIDGET: 2 })).unwrap();

      await engine.markPaid(staff, order.id);
      const delivered = await engine.markDelivered(staff, order.id);

      expect(delivered.unwrap().status).toBe('DELIVERED');

      const metrics = (await engine.metrics(staff)).unwrap();
      expect(metrics.orderCount).toBe(1);
      expect(metrics.totalRevenue).toBe(5);
      expect(metrics.completionRate).toBe(1);
      expect(metrics.topProducts).toEqual([{ productId: 'WIDGET', productName: 'Widget', quantity: 2, revenue: 5 }]);
    });

    it('should refuse to cancel a delivered order', async () => {
      const order = (await engine.placeOrder(alice, 'alice', { WIDGET: 2 })).unwrap();
      await engine.transition(staff, order.id, 'PAID');
      await engine.transition(staff, order.id, 'DELIVERED');

      const result = await engine.cancel(alice, order.id);

      expect(result.failed).toBe(true);
      if (result.failed) expect(result.code).toBe('ILLEGAL_TRANSITION');
      expect((await engine.peek(alice, 'WIDGET')).unwrap()).toBe(3);
    });

    it('should read and list orders', async () => {
      const order = (await engine.placeOrder(alice, 'alice', { WIDGET: 1 })).unwrap();
      await engine.placeOrder(staff, 'bob', { WIDGET: 1 });

      expect((await engine.getOrder(alice, order.id)).unwrap()).toEqual(order);
      expect((await engine.listOrders(staff, { userRef: 'alice' })).unwrap().map((o) => o.id)).toEqual([order.id]);
      expect((await engine.listOrders(staff)).unwrap()).toHaveLength(2);
    });

    it('should fail to read an unknown order', async () => {
      const result = await engine.getOrder(alice, 'ord_missing');

      expect(result.failed).toBe(true);
      if (result.failed) expect(result.reason).toBe("Order 'ord_missing' not found");
    });

    it('should sell the last units to exactly one of two customers', async () => {
      const results = await Promise.all([
        engine.placeOrder(alice, 'alice', { WIDGET: 3 }),
        engine.placeOrder(staff, 'bob', { WIDGET: 3 }),
      ]);

      expect(results.filter((r) => r.success)).toHaveLength(1);
      expect((await engine.peek(alice, 'WIDGET')).unwrap()).toBe(2);
    });
  });

  describe('readers during a cancellation', () => {
    async function readAll(orderId: string) {
      const [low, listed, metrics, order, stock] = await Promise.all([
        engine.lowStock(staff),
        engine.listOrders(staff),
        engine.metrics(staff),
        engine.getOrder(staff, orderId),
        engine.peek(staff, 'WIDGET'),
      ]);
      return {
        low: low.unwrap().map((p) => p.id),
        listed: listed.unwrap().map((o) => o.status),
        metrics: metrics.unwrap(),
        status: order.unwrap().status,
        stock: stock.unwrap(),
      };
    }

    it('should wait for the status write before showing released stock', async () => {
      const order = (await engine.placeOrder(alice, 'alice', { WIDGET: 4 })).unwrap();
      const paused = pauseNextSave(orders, 'commit');

      const cancelling = engine.cancel(alice, order.id);
      await paused.saving;
      expect((await products.getProduct('WIDGET'))?.availableQuantity).toBe(5);

      let readersDone = false;
      const reading = readAll(order.id).then((view) => {
        readersDone = true;
        return view;
      });
      await new Promise((resolve) => setTimeout(resolve, 10));
      expect(readersDone).toBe(false);

      paused.resume();
      const cancelled = await cancelling;
      const view = await reading;

      expect(cancelled.unwrap().status).toBe('CANCELLED');
      expect(view.low).toEqual([]);
      expect(view.listed).toEqual(['CANCELLED']);
      expect(view.metrics.statusCounts.CANCELLED).toBe(1);
      expect(view.metrics.pendingCount).toBe(0);
      expect(view.status).toBe('CANCELLED');
      expect(view.stock).toBe(5);
    });

    it('should show the order still reserved when the status write fails', async () => {
      const order = (await engine.placeOrder(alice, 'alice', { WIDGET: 4 })).unwrap();
      const paused = pauseNextSave(orders, 'fail');

      const cancelling = engine.cancel(alice, order.id);
      await paused.saving;
      const reading = readAll(order.id);
      paused.resume();

      const cancelled = await cancelling;
      const view = await reading;

      expect(cancelled.failed).toBe(true);
      if (cancelled.failed) expect(cancelled.code).toBe('PERSISTENCE');
      expect(view.low).toEqual(['WIDGET']);
      expect(view.listed).toEqual(['PLACED']);
      expect(view.metrics.pendingCount).toBe(1);
      expect(view.status).toBe('PLACED');
      expect(view.stock).toBe(1);

      const history = (await engine.stockHistory(staff, { orderId: order.id })).unwrap();
      expect(history.map((e) => [e.kind, e.quantityDelta, e.resultingQuantity])).toEqual([
        ['SALE', -4, 1],
        ['CANCELLATION', 4, 5],
        ['SALE', -4, 1],
      ]);
    });
  });

  describe('execution', () => {
    it('should stamp the actor on results', async () => {
      const result = await engine.peek(staff, 'WIDGET');

      expect(result.metadata.actor).toBe('staff-1');
    });

    it('should run globally registered middlewares', async () => {
      configure((config) => {
        config.middlewares.register(CorrelateMiddleware);
        config.middlewares.register(RuntimeMiddleware);
      });

      const result = await engine.peek(staff, 'WIDGET');

      expect(result.metadata.correlationId).toBe('req-1');
      expect(result.metadata.runtime).toBeGreaterThanOrEqual(0);
    });

    it('should prefer its own middlewares over the global ones', async () => {
      configure((config) => {
        config.middlewares.register(RuntimeMiddleware);
      });
      const own = new CommerceEngine({
        products,
        orders,
        logger: new Logger({ enabled: false }),
        middlewares: [CorrelateMiddleware],
      });

      const result = await own.peek(staff, 'WIDGET');

      expect(result.metadata.correlationId).toBe('req-1');
      expect(result.metadata.runtime).toBeUndefined();
    });

    it('should turn a throwing repository into a persistence failure', async () => {
      vi.spyOn(orders, 'listOrders').mockRejectedValueOnce(new Error('db down'));

      const result = await engine.listOrders(staff);

      expect(result.failed).toBe(true);
      if (result.failed) {
        expect(result.code).toBe('PERSISTENCE');
        expect(result.reason).toBe('Persistence failure during listOrders: db down');
        expect(result.metadata.actor).toBe('staff-1');
      }
    });

    it('should return an empty history without a journal', async () => {
      const bare = new CommerceEngine({ products, orders, logger: new Logger({ enabled: false }) });

      expect((await bare.stockHistory(staff)).unwrap()).toEqual([]);
    });

    it('should log every result', async () => {
      const lines: string[] = [];
      const output = new Writable({
        write(chunk: Buffer, _encoding, callback) {
          lines.push(chunk.toString());
          callback();
        },
      });
      const logged = new CommerceEngine({
        products,
        orders,
        logger: new Logger({ output, now: () => placedAt }),
      });

      await logged.peek(alice, 'NOPE');

      expect(lines).toEqual([
        `W, [2024-03-01T10:00:00.000Z #${process.pid}] WARN -- stockline: operation="ledger.peek" status="failed" code="NOT_FOUND" metadata={actor: "alice"} reason="Product 'NOPE' not found"\n`,
      ]);
    });
  });
});
