import type { Server } from 'http';
import { afterEach, describe, expect, it } from 'vitest';
import { createApp } from '../../src/app';
import { CartSessions } from '../../src/modules/cart/cart.sessions';
import { PantryService } from '../../src/modules/pantry/pantry.service';
import { MemoryPantryStore } from '../../src/modules/store/memory.store';
import type { PantryStore } from '../../src/modules/store/store.types';
import { fixedClock } from '../../src/utils/clock';
import { UnreachableStore } from './fixtures';

const now = new Date(2026, 4, 20, 17, 45, 12);

let server: Server | undefined;

const start = async (store: PantryStore): Promise<string> => {
  const pantry = new PantryService(store, fixedClock(now), { historyRetention: 'retain' });
  const app = createApp({ pantry, carts: new CartSessions() });

  const listening = await new Promise<Server>(resolve => {
    const instance = app.listen(0, '127.0.0.1', () => resolve(instance));
  });
  server = listening;

  const address = listening.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return `http://127.0.0.1:${address.port}`;
};

const send = async (url: string, init: { method?: string; cartId?: string; body?: unknown } = {}) => {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (init.cartId) {
    headers['X-Cart-Id'] = init.cartId;
  }
  const response = await fetch(url, {
    method: init.method ?? 'GET',
    headers,
    body: init.body === undefined ? undefined : JSON.stringify(init.body),
  });
  return { status: response.status, body: await response.json() };
};

afterEach(async () => {
  const running = server;
  server = undefined;
  if (running) {
    await new Promise<void>((resolve, reject) => running.close(error => (error ? reject(error) : resolve())));
  }
});

describe('HTTP API', () => {
  const seededStore = () =>
    new MemoryPantryStore({
      products: [{ ID: 2, Produto: 'Beans', Marca: '', Preco: 2.25, Estoque_Atual: 1, Estoque_Minimo: 4 }],
      history: [{ Data: '2026-01-01 08:00:00', Produto_ID: 2, Tipo: 'AUDIT', Qtd: 1, Preco_Na_Epoca: 0 }],
    });

  it('commits the session cart on checkout and leaves it empty', async () => {
    const store = seededStore();
    const base = await start(store);

    const put = await send(`${base}/api/cart/items/2`, {
      method: 'PUT',
      cartId: 'kitchen',
      body: { quantity: 3, unit_price: 2.4 },
    });
    expect(put.status).toBe(200);

    const checkout = await send(`${base}/api/cart/checkout`, { method: 'POST', cartId: 'kitchen' });
    expect(checkout.status).toBe(200);
    expect(checkout.body).toMatchObject({
      success: true,
      message: 'Purchase recorded',
      data: { status: 'committed', total: 7.2 },
    });

    const cart = await send(`${base}/api/cart`, { cartId: 'kitchen' });
    expect(cart.body).toEqual({ success: true, message: 'OK', data: { entries: [], total: 0 } });
    expect(store.rows().products[0].Estoque_Atual).toBe(4);
  });

  it('keeps carts of different sessions apart', async () => {
    const base = await start(seededStore());

    await send(`${base}/api/cart/items/2`, { method: 'PUT', cartId: 'kitchen', body: { quantity: 3 } });
    const household = await send(`${base}/api/cart`);

    expect(household.body).toEqual({ success: true, message: 'OK', data: { entries: [], total: 0 } });
  });

  describe('when the store is unreachable', () => {
    it('marks reads with the connection error', async () => {
      const base = await start(new UnreachableStore());

      const products = await send(`${base}/api/products`);
      expect(products).toEqual({
        status: 200,
        body: {
          success: true,
          message: 'Products loaded',
          data: [],
          meta: { connection_error: UnreachableStore.reason },
        },
      });

      const suggestions = await send(`${base}/api/suggestions`);
      expect(suggestions.body).toEqual({
        success: true,
        message: 'Pantry is stocked, nothing to buy',
        data: { items: [], forecast_total: 0 },
        meta: { connection_error: UnreachableStore.reason },
      });
    });

    it('refuses to prefill the cart', async () => {
      const store = new UnreachableStore();
      const base = await start(store);

      const prefill = await send(`${base}/api/cart/prefill`, { method: 'POST' });

      expect(prefill.status).toBe(503);
      expect(prefill.body).toEqual({
        success: false,
        message: 'Pantry store is unavailable, cart was not prefilled',
        error: { code: 'STORE_UNAVAILABLE', details: { reason: UnreachableStore.reason } },
      });
      expect(store.save).not.toHaveBeenCalled();
    });
  });
});
