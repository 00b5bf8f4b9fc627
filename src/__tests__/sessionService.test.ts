import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import { InMemorySessionStore } from '../session/InMemorySessionStore.js';
import { SessionService } from '../session/SessionService.js';
import type { CartItem } from '../session/sessionTypes.js';

const sunglasses: CartItem = {
  productId: 'p-sunglasses',
  name: 'Recycled sunglasses',
  quantity: 1,
  unitPrice: 60,
  currency: 'USD',
  footprintKg: 49,
};

describe('SessionService', () => {
  let store: InMemorySessionStore;
  let sessions: SessionService;
  let clock: number;

  beforeEach(() => {
    clock = Date.now();
    store = new InMemorySessionStore({ ttlSeconds: 600 });
    sessions = new SessionService({ store, ttlSeconds: 600, now: () => clock });
  });

  afterEach(() => {
    store.destroy();
  });

  it('returns the zero state for an unknown session without storing it', async () => {
    const view = await sessions.view('sess-new');

    expect(view.totalFootprintKg).toBe(0);
    expect(view.cartItems).toEqual([]);
    expect(view.lifecycle).toBe('active');
    expect(await store.exists('sess-new')).toBe(false);
    expect(await sessions.find('sess-new')).toBeNull();
  });

  it('commits transitions with a bumped version and fresh expiry', async () => {
    await sessions.addToCart('sess-1', sunglasses);
    clock += 2_000;
    const state = await sessions.selectShipping('sess-1', 'eco', 150);

    expect(state.totalFootprintKg).toBe(199);
    expect(state.version).toBe(2);
    expect(state.updatedAt).toBe(clock);
    expect(state.expiresAt).toBe(clock + 600_000);
  });

  it('keeps the total when the cart is viewed', async () => {
    await sessions.addToCart('sess-1', sunglasses);
    await sessions.selectShipping('sess-1', 'eco', 150);

    const first = await sessions.view('sess-1');
    const second = await sessions.view('sess-1');

    expect(first.totalFootprintKg).toBe(199);
    expect(second.version).toBe(first.version);
  });

  it('hands out frozen snapshots', async () => {
    const snapshot = await sessions.addToCart('sess-1', sunglasses);

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.cartItems)).toBe(true);
    expect(Object.isFrozen(snapshot.cartItems[0])).toBe(true);
  });

  it('leaves the stored state alone when a transition is rejected', async () => {
    await sessions.addToCart('sess-1', sunglasses);

    await expect(sessions.removeFromCart('sess-1', 'p-unknown')).rejects.toMatchObject({
      code: 'INVALID_SESSION_STATE',
    });

    const view = await sessions.view('sess-1');
    expect(view.version).toBe(1);
    expect(view.productFootprintKg).toBe(49);
  });

  it('serializes concurrent mutations on one session', async () => {
    const adds = Array.from({ length: 10 }, () => sessions.addToCart('sess-busy', { ...sunglasses, footprintKg: 1.5 }));

    await Promise.all(adds);

    const view = await sessions.view('sess-busy');
    expect(view.cartItems[0].quantity).toBe(10);
    expect(view.productFootprintKg).toBe(15);
    expect(view.version).toBe(10);
  });

  it('keeps sessions isolated from each other', async () => {
    await Promise.all([
      sessions.addToCart('sess-a', sunglasses),
      sessions.addToCart('sess-b', { ...sunglasses, productId: 'p-other', footprintKg: 2 }),
    ]);

    expect((await sessions.view('sess-a')).productFootprintKg).toBe(49);
    expect((await sessions.view('sess-b')).productFootprintKg).toBe(2);
  });

  it('drops a mutation whose signal aborted before it committed', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sessions.addToCart('sess-1', sunglasses, controller.signal)).rejects.toMatchObject({
      code: 'REQUEST_CANCELLED',
    });
    expect(await sessions.find('sess-1')).toBeNull();
  });

  it('drops a mutation aborted while the lock is held for it', async () => {
    const controller = new AbortController();

    await expect(
      sessions.withLock(
        'sess-1',
        async (_current, commit) => {
          controller.abort();
          return commit((state) => ({ ok: true, state: { ...state, lifecycle: 'checkout' } }), 'test');
        },
        controller.signal
      )
    ).rejects.toMatchObject({ code: 'REQUEST_CANCELLED' });

    expect((await sessions.view('sess-1')).lifecycle).toBe('active');
  });

  it('lets withLock commit several steps that each see the previous one', async () => {
    await sessions.addToCart('sess-1', sunglasses);

    const final = await sessions.withLock('sess-1', async (current, commit) => {
      expect(current.lifecycle).toBe('active');
      const inCheckout = await commit((state) => ({ ok: true, state: { ...state, lifecycle: 'checkout' } }), 'checkout');
      expect(inCheckout.lifecycle).toBe('checkout');
      return commit((state) => ({ ok: true, state: { ...state, lifecycle: 'active' } }), 'back');
    });

    expect(final.version).toBe(3);
  });

  it('refuses to commit a state whose total drifted', async () => {
    await expect(
      sessions.apply('sess-1', 'broken', (state) => ({ ok: true, state: { ...state, totalFootprintKg: 5 } }))
    ).rejects.toMatchObject({ code: 'INTERNAL_ERROR' });
  });

  it('runs the whole checkout flow back to an empty cart', async () => {
    await sessions.addToCart('sess-1', sunglasses);
    await sessions.selectShipping('sess-1', 'eco', 150);
    await sessions.checkout('sess-1');
    const paid = await sessions.paymentSuccess('sess-1', { orderId: 'order-1', paidAt: clock });

    expect(paid.totalFootprintKg).toBe(0);
    expect(paid.cartItems).toEqual([]);
    expect(paid.lastOrder?.totalFootprintKg).toBe(199);
  });
});
