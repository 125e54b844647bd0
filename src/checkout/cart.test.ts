import { describe, it, expect } from 'vitest';
import { Cart, parseCart } from './cart.js';

describe('Cart', () => {
  it('should start empty', () => {
    const cart = Cart.empty();

    expect(cart.isEmpty).toBe(true);
    expect(cart.size).toBe(0);
    expect(cart.totalQuantity).toBe(0);
    expect(cart.lines()).toEqual([]);
  });

  it('should sum quantities added for the same product', () => {
    const cart = Cart.empty().add('WIDGET', 2).add('WIDGET').add('GADGET', 3);

    expect(cart.quantityOf('WIDGET')).toBe(3);
    expect(cart.size).toBe(2);
    expect(cart.totalQuantity).toBe(6);
  });

  it('should not mutate the original on change', () => {
    const original = Cart.empty().add('WIDGET', 1);
    const changed = original.add('WIDGET', 1);

    expect(original.quantityOf('WIDGET')).toBe(1);
    expect(changed.quantityOf('WIDGET')).toBe(2);
    expect(Object.isFrozen(original)).toBe(true);
  });

  it('should replace quantities with set and drop lines set to zero', () => {
    const cart = Cart.from({ WIDGET: 4, GADGET: 1 }).set('WIDGET', 2).set('GADGET', 0);

    expect(cart.toJSON()).toEqual({ WIDGET: 2 });
  });

  it('should remove and clear lines', () => {
    const cart = Cart.from(new Map([['WIDGET', 1], ['GADGET', 2]]));

    expect(cart.remove('WIDGET').lines()).toEqual([{ productId: 'GADGET', quantity: 2 }]);
    expect(cart.remove('missing')).toBe(cart);
    expect(cart.clear().isEmpty).toBe(true);
  });
});

describe('parseCart', () => {
  it('should accept a record of positive quantities', () => {
    const result = parseCart({ WIDGET: 2, GADGET: 1 });

    expect(result.success).toBe(true);
    expect(result.unwrap()).toEqual([
      { productId: 'WIDGET', quantity: 2 },
      { productId: 'GADGET', quantity: 1 },
    ]);
  });

  it('should accept a Map and a Cart', () => {
    expect(parseCart(new Map([['WIDGET', 1]])).unwrap()).toEqual([{ productId: 'WIDGET', quantity: 1 }]);
    expect(parseCart(Cart.empty().add('WIDGET', 3)).unwrap()).toEqual([{ productId: 'WIDGET', quantity: 3 }]);
  });

  it('should reject an empty cart', () => {
    const result = parseCart({});

    expect(result.failed).toBe(true);
    if (result.failed) {
      expect(result.code).toBe('INVALID_CART');
      expect(result.reason).toBe('Invalid cart: cart must contain at least one item.');
    }
  });

  it('should reject a zero quantity under the product id', () => {
    const result = parseCart({ WIDGET: 0 });

    expect(result.failed).toBe(true);
    if (result.failed) {
      expect(result.error.issues.get('WIDGET')).toEqual(['quantity must be greater than zero']);
      expect(result.reason).toBe('Invalid cart: WIDGET quantity must be greater than zero.');
    }
  });

  it('should reject negative and fractional quantities', () => {
    const result = parseCart({ WIDGET: -2, GADGET: 1.5 });

    expect(result.failed).toBe(true);
    if (result.failed) {
      expect(result.error.issues.messages).toEqual({
        WIDGET: ['quantity must be greater than zero'],
        GADGET: ['quantity must be a whole number'],
      });
    }
  });

  it('should key a blank product id by its line number', () => {
    const result = parseCart({ WIDGET: 1, '': 2 });

    expect(result.failed).toBe(true);
    if (result.failed) {
      expect(result.error.issues.get('line 2')).toEqual(['must reference a product']);
    }
  });

  it('should name the failing operation', () => {
    expect(parseCart({}, 'checkout.placeOrder').operation).toBe('checkout.placeOrder');
  });
});
