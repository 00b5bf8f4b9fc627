import { z } from 'zod';

export type Lifecycle = 'active' | 'checkout' | 'completed';

/**
 * Maximum number of distinct cart lines kept in a session.
 * Keeps persisted session size bounded.
 */
export const MAX_CART_ITEMS_IN_SESSION = 50;

/**
 * A single line in the cart. `footprintKg` is per unit.
 */
export interface CartItem {
  productId: string;
  name: string;
  quantity: number;
  unitPrice: number;
  currency: string;
  footprintKg: number;
}

/**
 * Confirmation of the most recent paid order, kept after the cart resets.
 */
export interface OrderConfirmation {
  orderId: string;
  transactionId?: string;
  totalFootprintKg: number;
  productFootprintKg: number;
  shippingFootprintKg: number;
  itemCount: number;
  amount: number;
  currency: string;
  shippingMethod: string | null;
  paidAt: number;
}

/**
 * Shopping session owned by the session store.
 *
 * `totalFootprintKg` always equals `productFootprintKg + shippingFootprintKg`;
 * it is stored so readers get it from the same snapshot as its components.
 */
export interface SessionState {
  sessionId: string;
  cartItems: CartItem[];
  productFootprintKg: number;
  shippingFootprintKg: number;
  selectedShippingMethod: string | null;
  totalFootprintKg: number;
  lifecycle: Lifecycle;
  /** Incremented by every committed mutation. */
  version: number;
  updatedAt: number;
  expiresAt: number;
  lastOrder?: OrderConfirmation;
}

export type SessionSnapshot = Readonly<SessionState>;

const cartItemSchema = z.object({
  productId: z.string(),
  name: z.string(),
  quantity: z.number().int().positive(),
  unitPrice: z.number().nonnegative(),
  currency: z.string(),
  footprintKg: z.number().nonnegative(),
});

/**
 * Shape check for sessions read back from an external store.
 */
export const sessionStateSchema = z.object({
  sessionId: z.string(),
  cartItems: z.array(cartItemSchema),
  productFootprintKg: z.number(),
  shippingFootprintKg: z.number(),
  selectedShippingMethod: z.string().nullable(),
  totalFootprintKg: z.number(),
  lifecycle: z.enum(['active', 'checkout', 'completed']),
  version: z.number().int().nonnegative(),
  updatedAt: z.number(),
  expiresAt: z.number(),
  lastOrder: z
    .object({
      orderId: z.string(),
      transactionId: z.string().optional(),
      totalFootprintKg: z.number(),
      productFootprintKg: z.number(),
      shippingFootprintKg: z.number(),
      itemCount: z.number(),
      amount: z.number(),
      currency: z.string(),
      shippingMethod: z.string().nullable(),
      paidAt: z.number(),
    })
    .optional(),
});

export function createEmptySession(sessionId: string, now: number, ttlMs: number): SessionState {
  return {
    sessionId,
    cartItems: [],
    productFootprintKg: 0,
    shippingFootprintKg: 0,
    selectedShippingMethod: null,
    totalFootprintKg: 0,
    lifecycle: 'active',
    version: 0,
    updatedAt: now,
    expiresAt: now + ttlMs,
  };
}

/**
 * Deep-freeze a copy of `state` so holders of the snapshot cannot observe or
 * cause later changes.
 */
export function freezeSession(state: SessionState): SessionSnapshot {
  const cartItems = state.cartItems.map((item) => Object.freeze({ ...item }));
  Object.freeze(cartItems);
  const copy: SessionState = { ...state, cartItems };
  if (state.lastOrder) {
    copy.lastOrder = Object.freeze({ ...state.lastOrder });
  }
  return Object.freeze(copy);
}
