import { AppError } from '../errors/AppError.js';
import {
  MAX_CART_ITEMS_IN_SESSION,
  type CartItem,
  type Lifecycle,
  type OrderConfirmation,
  type SessionState,
} from './sessionTypes.js';

/**
 * Footprint state machine: active → checkout → completed → active.
 *
 * Every transition is a pure function of the previous state. On success it
 * returns a new state; on a violated precondition it returns an
 * INVALID_SESSION_STATE error and the caller keeps the old state. Version
 * and timestamps are stamped by the session service when it commits.
 */

export type Transition = { ok: true; state: SessionState } | { ok: false; error: AppError };

export const FOOTPRINT_TOLERANCE_KG = 1e-6;

function roundKg(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

export function computeProductFootprint(items: readonly CartItem[]): number {
  return roundKg(items.reduce((sum, item) => sum + item.quantity * item.footprintKg, 0));
}

export function cartAmount(items: readonly CartItem[]): number {
  return Math.round(items.reduce((sum, item) => sum + item.quantity * item.unitPrice, 0) * 100) / 100;
}

export function itemCount(items: readonly CartItem[]): number {
  return items.reduce((sum, item) => sum + item.quantity, 0);
}

/**
 * True when the stored total equals the sum of its components.
 */
export function isConsistent(state: SessionState): boolean {
  return Math.abs(state.totalFootprintKg - (state.productFootprintKg + state.shippingFootprintKg)) <= FOOTPRINT_TOLERANCE_KG;
}

function withCart(state: SessionState, cartItems: CartItem[]): SessionState {
  const productFootprintKg = computeProductFootprint(cartItems);
  // Nothing left to ship once the cart is empty.
  const emptied = cartItems.length === 0;
  const shippingFootprintKg = emptied ? 0 : state.shippingFootprintKg;
  return {
    ...state,
    cartItems,
    productFootprintKg,
    shippingFootprintKg,
    selectedShippingMethod: emptied ? null : state.selectedShippingMethod,
    totalFootprintKg: roundKg(productFootprintKg + shippingFootprintKg),
  };
}

function reject(operation: string, reason: string, state: SessionState, details?: Record<string, unknown>): Transition {
  return {
    ok: false,
    error: AppError.invalidSessionState(operation, reason, { lifecycle: state.lifecycle, ...details }),
  };
}

function requireLifecycle(
  operation: string,
  state: SessionState,
  allowed: readonly Lifecycle[]
): Transition | null {
  if (allowed.includes(state.lifecycle)) {
    return null;
  }
  return reject(operation, `Cannot ${operation} while the session is in ${state.lifecycle}.`, state, {
    allowed: allowed.join(','),
  });
}

export function addToCart(state: SessionState, item: CartItem): Transition {
  const blocked = requireLifecycle('add to cart', state, ['active']);
  if (blocked) return blocked;

  if (!Number.isInteger(item.quantity) || item.quantity <= 0) {
    return reject('add to cart', 'Quantity must be a positive whole number.', state, { quantity: item.quantity });
  }
  if (!Number.isFinite(item.footprintKg) || item.footprintKg < 0) {
    return reject('add to cart', 'Item footprint must be a non-negative number.', state);
  }

  const existing = state.cartItems.find((line) => line.productId === item.productId);
  if (!existing && state.cartItems.length >= MAX_CART_ITEMS_IN_SESSION) {
    return reject('add to cart', `The cart holds at most ${MAX_CART_ITEMS_IN_SESSION} different products.`, state);
  }

  const cartItems = existing
    ? state.cartItems.map((line) =>
        line.productId === item.productId ? { ...item, quantity: line.quantity + item.quantity } : line
      )
    : [...state.cartItems, { ...item }];

  return { ok: true, state: withCart(state, cartItems) };
}

/**
 * Remove `quantity` units of a product, or the whole line when quantity is
 * omitted or covers everything in the cart.
 */
export function removeFromCart(state: SessionState, productId: string, quantity?: number): Transition {
  const blocked = requireLifecycle('remove from cart', state, ['active']);
  if (blocked) return blocked;

  const existing = state.cartItems.find((line) => line.productId === productId);
  if (!existing) {
    return reject('remove from cart', 'That product is not in the cart.', state, { productId });
  }
  if (quantity !== undefined && (!Number.isInteger(quantity) || quantity <= 0)) {
    return reject('remove from cart', 'Quantity must be a positive whole number.', state, { quantity });
  }

  const cartItems =
    quantity === undefined || quantity >= existing.quantity
      ? state.cartItems.filter((line) => line.productId !== productId)
      : state.cartItems.map((line) =>
          line.productId === productId ? { ...line, quantity: line.quantity - quantity } : line
        );

  return { ok: true, state: withCart(state, cartItems) };
}

/**
 * Replace the shipping footprint. Repeated calls overwrite, they never add up.
 */
export function selectShipping(state: SessionState, method: string, footprintKg: number): Transition {
  const blocked = requireLifecycle('select shipping', state, ['active', 'checkout']);
  if (blocked) return blocked;

  if (state.cartItems.length === 0) {
    return reject('select shipping', 'Add something to the cart before choosing shipping.', state);
  }
  if (!Number.isFinite(footprintKg) || footprintKg < 0) {
    return reject('select shipping', 'Shipping footprint must be a non-negative number.', state);
  }

  const shippingFootprintKg = roundKg(footprintKg);
  return {
    ok: true,
    state: {
      ...state,
      selectedShippingMethod: method,
      shippingFootprintKg,
      totalFootprintKg: roundKg(state.productFootprintKg + shippingFootprintKg),
    },
  };
}

export function checkout(state: SessionState): Transition {
  const blocked = requireLifecycle('check out', state, ['active']);
  if (blocked) return blocked;

  if (state.cartItems.length === 0) {
    return reject('check out', 'The cart is empty.', state);
  }
  return { ok: true, state: { ...state, lifecycle: 'checkout' } };
}

export interface PaymentDetails {
  orderId: string;
  transactionId?: string;
  paidAt: number;
}

/**
 * Complete the order and reset the session for the next one. The completed
 * state is transient: the returned state is already back to active, with the
 * confirmation kept in `lastOrder`.
 */
export function paymentSuccess(state: SessionState, payment: PaymentDetails): Transition {
  const blocked = requireLifecycle('confirm payment', state, ['checkout']);
  if (blocked) return blocked;

  const completed: SessionState = { ...state, lifecycle: 'completed' };
  const lastOrder: OrderConfirmation = {
    orderId: payment.orderId,
    transactionId: payment.transactionId,
    totalFootprintKg: completed.totalFootprintKg,
    productFootprintKg: completed.productFootprintKg,
    shippingFootprintKg: completed.shippingFootprintKg,
    itemCount: itemCount(completed.cartItems),
    amount: cartAmount(completed.cartItems),
    currency: completed.cartItems[0]?.currency ?? 'USD',
    shippingMethod: completed.selectedShippingMethod,
    paidAt: payment.paidAt,
  };

  return { ok: true, state: { ...resetFootprint(completed), lastOrder } };
}

/**
 * Explicit cart clear. Only an active session can be cleared; a checkout in
 * progress has to be paid first.
 */
export function clearCart(state: SessionState): Transition {
  const blocked = requireLifecycle('clear the cart', state, ['active']);
  if (blocked) return blocked;
  return { ok: true, state: resetFootprint(state) };
}

/**
 * Read-only view. Returns the same object it was given.
 */
export function viewCart(state: SessionState): SessionState {
  return state;
}

function resetFootprint(state: SessionState): SessionState {
  return {
    ...state,
    cartItems: [],
    productFootprintKg: 0,
    shippingFootprintKg: 0,
    selectedShippingMethod: null,
    totalFootprintKg: 0,
    lifecycle: 'active',
  };
}
