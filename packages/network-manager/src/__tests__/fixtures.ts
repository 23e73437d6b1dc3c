import { z } from 'zod';
import { optional } from '@opgraph/core';
import { NetworkManager } from '../manager.js';

export function createPricingManager(): NetworkManager {
  const manager = new NetworkManager({ name: 'pricing' });

  manager.registerOperation({
    name: 'subtotal',
    needs: ['price', 'quantity'],
    provides: ['subtotal'],
    label: 'Subtotal',
    inputSchema: z.object({
      price: z.number().describe('Unit price'),
      quantity: z.number().int().default(1),
    }),
    fn: ({ price, quantity }) => ({ subtotal: Number(price) * Number(quantity) }),
  });

  manager.registerOperation({
    name: 'shipping',
    needs: ['subtotal', optional('fee')],
    provides: ['total'],
    description: 'Adds the shipping fee',
    fn: ({ subtotal, fee }) => ({ total: Number(subtotal) + Number(fee ?? 5) }),
  });

  return manager;
}
