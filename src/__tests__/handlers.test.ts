import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import { SimulatedPaymentGateway } from '../collaborators/PaymentGateway.js';
import { CartHandler } from '../handlers/CartHandler.js';
import { CheckoutHandler } from '../handlers/CheckoutHandler.js';
import { ComparisonHandler, scoreProducts } from '../handlers/ComparisonHandler.js';
import { DiscoveryHandler } from '../handlers/DiscoveryHandler.js';
import { FootprintHandler } from '../handlers/FootprintHandler.js';
import { GeneralHandler } from '../handlers/GeneralHandler.js';
import type { RatedProduct } from '../handlers/toolCalls.js';
import { ALL_TOOLS, CATALOG_ENDPOINT, EMISSIONS_ENDPOINT } from '../transport/toolNames.js';
import { createHarness, handlerRequest } from './handlerHarness.js';

describe('built-in handlers', () => {
  let harness: ReturnType<typeof createHarness>;

  beforeEach(() => {
    harness = createHarness();
  });

  afterEach(() => {
    harness.store.destroy();
  });

  describe('DiscoveryHandler', () => {
    it('rates search hits and orders them by footprint', async () => {
      const handler = new DiscoveryHandler(harness.transport);

      const result = await handler.handle(handlerRequest('product_search', { category: 'kitchen' }));

      expect(result.summary).toBe('Found 3 products; Glass Storage Jar has the lowest footprint at 0.99 kg CO2e.');
      expect(result.followUp).toBeUndefined();
    });

    it('applies the price range', async () => {
      const handler = new DiscoveryHandler(harness.transport);

      const result = await handler.handle(handlerRequest('product_search', { category: 'kitchen', maxPrice: 9 }));

      expect(result.summary).toBe('Found 2 products; Glass Storage Jar has the lowest footprint at 0.99 kg CO2e.');
    });

    it('reports when nothing matches', async () => {
      const handler = new DiscoveryHandler(harness.transport);

      const result = await handler.handle(handlerRequest('product_search', { query: 'surfboard' }));

      expect(result.summary).toBe('No products matched "surfboard".');
    });

    it('asks for a comparison follow-up on compare requests', async () => {
      const handler = new DiscoveryHandler(harness.transport);

      const result = await handler.handle(handlerRequest('compare', { category: 'kitchen' }));

      expect(result.followUp).toEqual({
        intent: 'compare',
        parameters: { productIds: ['p-jar', 'p-shakers', 'p-mug'] },
        handlers: ['comparison'],
      });
    });
  });

  describe('FootprintHandler', () => {
    it('reports the footprint of a single product', async () => {
      const handler = new FootprintHandler(harness.transport, harness.sessions);

      const result = await handler.handle(handlerRequest('footprint', { productId: 'p-sunglasses' }));

      expect(result.summary).toBe('Recycled Plastic Sunglasses has a footprint of 1.4 kg CO2e per unit (rating A).');
    });

    it('lists shipping options lowest footprint first', async () => {
      const handler = new FootprintHandler(harness.transport, harness.sessions);

      const result = await handler.handle(handlerRequest('shipping_options'));

      expect(result.summary).toBe(
        'Shipping options, lowest footprint first. Eco-Friendly Shipping: 150 kg CO2e, 4-6 days; ' +
          'Ground Shipping: 250 kg CO2e, 3-5 days; Express Shipping: 1000 kg CO2e, 1-2 days.'
      );
    });

    it('quotes a shipping method without touching the session', async () => {
      const handler = new FootprintHandler(harness.transport, harness.sessions);

      const result = await handler.handle(handlerRequest('shipping_select', { shippingMethod: 'express' }));

      expect(result.summary).toBe('Express Shipping adds 1000 kg CO2e.');
      expect(result.session).toBeUndefined();
      expect(await harness.sessions.find('sess-handler')).toBeNull();
    });

    it('rejects an unknown shipping method', async () => {
      const handler = new FootprintHandler(harness.transport, harness.sessions);

      await expect(handler.handle(handlerRequest('shipping_select', { shippingMethod: 'drone' }))).rejects.toMatchObject({
        code: 'VALIDATION_REQUEST_INVALID',
      });
    });

    it('summarizes the session footprint with an explanation', async () => {
      const handler = new FootprintHandler(harness.transport, harness.sessions);

      const result = await handler.handle(handlerRequest('footprint'));

      expect(result.summary).toBe("Your cart's footprint is 0 kg CO2e (0 kg products, 0 kg shipping).");
      expect(result.data.explanation).toBe(
        'Explain a shopping footprint of 0 kg CO2e: 0 kg from products and 0 kg from shipping.'
      );
    });
  });

  describe('CartHandler', () => {
    it('adds a product found by name with its footprint', async () => {
      const handler = new CartHandler(harness.transport, harness.sessions);

      const result = await handler.handle(handlerRequest('cart_add', { productRef: 'sunglasses', quantity: 2 }));

      expect(result.summary).toBe(
        'Added 2 x Recycled Plastic Sunglasses (1.4 kg CO2e each). Your cart has 2 x Recycled Plastic Sunglasses. Total footprint 2.8 kg CO2e.'
      );
      expect(result.session?.productFootprintKg).toBe(2.8);
    });

    it('removes a cart line by name', async () => {
      const handler = new CartHandler(harness.transport, harness.sessions);
      await handler.handle(handlerRequest('cart_add', { productId: 'p-mug' }));

      const result = await handler.handle(handlerRequest('cart_remove', { productRef: 'mug' }));

      expect(result.summary).toBe('Removed 1 x Stoneware Mug. Your cart is empty.');
    });

    it('refuses to remove something that is not in the cart', async () => {
      const handler = new CartHandler(harness.transport, harness.sessions);

      await expect(handler.handle(handlerRequest('cart_remove', { productRef: 'watch' }))).rejects.toMatchObject({
        code: 'INVALID_SESSION_STATE',
      });
    });

    it('reports an unknown product id as not found', async () => {
      const handler = new CartHandler(harness.transport, harness.sessions);

      await expect(handler.handle(handlerRequest('cart_add', { productId: 'p-unicorn' }))).rejects.toMatchObject({
        safeMessage: "Product 'p-unicorn' not found",
      });
    });

    it('views and clears the cart', async () => {
      const handler = new CartHandler(harness.transport, harness.sessions);
      await handler.handle(handlerRequest('cart_add', { productId: 'p-notebook', quantity: 3 }));

      const view = await handler.handle(handlerRequest('cart_view'));
      const cleared = await handler.handle(handlerRequest('cart_clear'));

      expect(view.summary).toBe('Your cart has 3 x Recycled Paper Notebook. Total footprint 2.01 kg CO2e.');
      expect(cleared.session?.totalFootprintKg).toBe(0);
    });
  });

  describe('CheckoutHandler', () => {
    it('applies the shipping quote from the previous handler in the chain', async () => {
      const cart = new CartHandler(harness.transport, harness.sessions);
      const footprint = new FootprintHandler(harness.transport, harness.sessions);
      const checkout = new CheckoutHandler(harness.transport, harness.sessions, new SimulatedPaymentGateway());
      await cart.handle(handlerRequest('cart_add', { productId: 'p-sunglasses' }));

      const quote = await footprint.handle(handlerRequest('shipping_select', { shippingMethod: 'eco' }));
      const result = await checkout.handle(handlerRequest('shipping_select', { shippingMethod: 'eco' }, { previous: quote }));

      expect(result.summary).toBe('Shipping set to Eco-Friendly Shipping (150 kg CO2e). Total footprint is now 151.4 kg CO2e.');
    });

    it('pays for the cart and starts the next one at zero', async () => {
      const cart = new CartHandler(harness.transport, harness.sessions);
      const checkout = new CheckoutHandler(harness.transport, harness.sessions, new SimulatedPaymentGateway());
      await cart.handle(handlerRequest('cart_add', { productId: 'p-sunglasses' }));

      const result = await checkout.handle(handlerRequest('payment'));

      expect(result.data.paid).toBe(true);
      expect(result.session?.cartItems).toEqual([]);
      expect(result.session?.totalFootprintKg).toBe(0);
      expect(result.session?.lastOrder?.amount).toBe(24.99);
    });

    it('keeps the order at checkout when the payment is declined', async () => {
      const cart = new CartHandler(harness.transport, harness.sessions);
      const checkout = new CheckoutHandler(
        harness.transport,
        harness.sessions,
        new SimulatedPaymentGateway({ decline: () => 'Card expired' })
      );
      await cart.handle(handlerRequest('cart_add', { productId: 'p-sunglasses' }));

      const result = await checkout.handle(handlerRequest('payment'));

      expect(result.summary).toBe('Payment was declined: Card expired. Your order is still waiting at checkout.');
      expect((await harness.sessions.view('sess-handler')).lifecycle).toBe('checkout');
    });

    it('starts checkout with the cart totals', async () => {
      const cart = new CartHandler(harness.transport, harness.sessions);
      const checkout = new CheckoutHandler(harness.transport, harness.sessions, new SimulatedPaymentGateway());
      await cart.handle(handlerRequest('cart_add', { productId: 'p-notebook', quantity: 2 }));

      const result = await checkout.handle(handlerRequest('checkout'));

      expect(result.summary).toBe('Checkout started for 2 items, 13.98 USD, 1.34 kg CO2e.');
    });

    it('refuses to check out an empty cart', async () => {
      const checkout = new CheckoutHandler(harness.transport, harness.sessions, new SimulatedPaymentGateway());

      await expect(checkout.handle(handlerRequest('checkout'))).rejects.toMatchObject({ code: 'INVALID_SESSION_STATE' });
    });
  });

  describe('ComparisonHandler', () => {
    it('picks the lowest footprint, cheapest and best value', async () => {
      const handler = new ComparisonHandler(harness.transport);

      const result = await handler.handle(handlerRequest('compare', { productIds: ['p-watch', 'p-sunglasses'] }));

      expect(result.summary).toBe(
        'Recycled Plastic Sunglasses has the lowest footprint (1.4 kg CO2e); Recycled Plastic Sunglasses is the cheapest; ' +
          'Recycled Plastic Sunglasses is the best overall value.'
      );
      expect(result.data.bestValue).toBe('p-sunglasses');
    });

    it('needs at least two products', async () => {
      const handler = new ComparisonHandler(harness.transport);

      await expect(handler.handle(handlerRequest('compare', { productIds: ['p-watch', 'p-watch'] }))).rejects.toMatchObject({
        code: 'VALIDATION_REQUEST_INVALID',
      });
    });

    it('weights footprint over price in the value score', () => {
      const base = { description: '', category: 'home', materials: [], weightKg: 1, currency: 'USD' };
      const products: RatedProduct[] = [
        { ...base, id: 'p-a', name: 'A', price: 10, footprintKg: 10, rating: 'B' },
        { ...base, id: 'p-b', name: 'B', price: 20, footprintKg: 5, rating: 'B' },
      ];

      expect(scoreProducts(products).map((product) => product.valueScore)).toEqual([0.3, 0.7]);
    });
  });

  describe('GeneralHandler', () => {
    it('explains what the assistant does and lists the categories', async () => {
      const handler = new GeneralHandler(harness.transport);

      const result = await handler.handle(handlerRequest('general'));

      expect(result.data.categories).toEqual(['accessories', 'books', 'clothing', 'electronics', 'home', 'kitchen', 'sports']);
      expect(result.summary.endsWith('Try asking for something in accessories, books, clothing, electronics, home, kitchen, sports.')).toBe(
        true
      );
    });
  });

  describe('probes and broadcasts', () => {
    it('answers probes when its endpoints respond', async () => {
      const handler = new GeneralHandler(harness.transport);

      await expect(handler.probe(new AbortController().signal)).resolves.toBe(true);
    });

    it('answers ping, describe and unknown broadcasts', async () => {
      const handler = new GeneralHandler(harness.transport);
      const signal = new AbortController().signal;

      expect(await handler.receive({ type: 'ping' }, signal)).toEqual({ pong: true, handler: 'general' });
      expect(await handler.receive({ type: 'describe' }, signal)).toEqual({
        name: 'general',
        description: 'Answers general questions and explains what the assistant can do.',
        capabilities: ['general'],
      });
      expect(await handler.receive({ type: 'cache_invalidate' }, signal)).toEqual({
        handler: 'general',
        ignored: 'cache_invalidate',
      });
    });
  });

  describe('built-in tool endpoints', () => {
    it('publish every tool the handlers call', async () => {
      const catalog = await harness.transport.discover(CATALOG_ENDPOINT);
      const emissions = await harness.transport.discover(EMISSIONS_ENDPOINT);

      const names = [...catalog.tools, ...emissions.tools].map((tool) => tool.name);
      expect(names.sort()).toEqual([...ALL_TOOLS].sort());
    });
  });
});
