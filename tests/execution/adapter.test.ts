import { describe, expect, it } from 'vitest';

import { ExecutionAdapter, simulatedOrderId } from '../../src/execution/adapter.js';
import { ConnectionManager } from '../../src/execution/connection-manager.js';
import { FakeBrokerClient, makeOrder } from './fakes.js';

const ORDERS = [makeOrder('AAA', 'buy', 150), makeOrder('BBB', 'buy', 12.5), makeOrder('CCC', 'sell', 100)];

async function connected(client: FakeBrokerClient): Promise<ConnectionManager> {
  const manager = new ConnectionManager({ clientFactory: () => client });
  await manager.connect(client.broker, { keyId: 'test-key', secret: 'test-secret', mode: 'paper' });
  return manager;
}

describe('simulatedOrderId', () => {
  it('is stable for the same order and differs when the order changes', () => {
    const id = simulatedOrderId('alpaca', ORDERS[0]);

    expect(id).toMatch(/^sim-alpaca-AAA-[0-9a-f]{10}$/);
    expect(simulatedOrderId('alpaca', ORDERS[0])).toBe(id);
    expect(simulatedOrderId('alpaca', makeOrder('AAA', 'buy', 151))).not.toBe(id);
    expect(simulatedOrderId('swissquote', ORDERS[0])).toMatch(/^sim-swissquote-AAA-[0-9a-f]{10}$/);
  });
});

describe('ExecutionAdapter.execute', () => {
  it('simulates every order when the broker is not connected', async () => {
    const adapter = new ExecutionAdapter(new ConnectionManager());

    const results = await adapter.execute(ORDERS, 'alpaca');

    expect(results.map(r => r.status)).toEqual(['simulated', 'simulated', 'simulated']);
    expect(results[1]).toEqual({
      ticker: 'BBB',
      brokerSymbol: 'BBB',
      side: 'buy',
      quantity: 12.5,
      dollarAmount: 1250,
      status: 'simulated',
      brokerOrderId: simulatedOrderId('alpaca', ORDERS[1]),
    });
  });

  it('submits market orders in sequence through the live client', async () => {
    const client = new FakeBrokerClient('alpaca');
    const adapter = new ExecutionAdapter(await connected(client));

    const results = await adapter.execute(ORDERS, 'alpaca');

    expect(client.submitted).toEqual([
      { symbol: 'AAA', quantity: 150, side: 'buy', orderType: 'market' },
      { symbol: 'BBB', quantity: 12.5, side: 'buy', orderType: 'market' },
      { symbol: 'CCC', quantity: 100, side: 'sell', orderType: 'market' },
    ]);
    expect(results.map(r => [r.status, r.brokerOrderId])).toEqual([
      ['submitted', 'ord-1'],
      ['submitted', 'ord-2'],
      ['submitted', 'ord-3'],
    ]);
  });

  it('marks a rejected order as failed and carries on with the rest', async () => {
    const client = new FakeBrokerClient('alpaca');
    client.rejectSymbols.add('BBB');
    const adapter = new ExecutionAdapter(await connected(client));

    const results = await adapter.execute(ORDERS, 'alpaca');

    expect(results.map(r => r.status)).toEqual(['submitted', 'failed', 'submitted']);
    expect(results[1].error).toBe('rejected BBB');
    expect(results[1].brokerOrderId).toBeUndefined();
    expect(client.submitted.map(o => o.symbol)).toEqual(['AAA', 'CCC']);
  });

  it('simulates an incomplete allocation even with a live connection', async () => {
    const client = new FakeBrokerClient('swissquote');
    const adapter = new ExecutionAdapter(await connected(client));

    const results = await adapter.execute(ORDERS, 'swissquote', { complete: false });

    expect(results.map(r => r.status)).toEqual(['simulated', 'simulated', 'simulated']);
    expect(client.submitted).toEqual([]);
  });
});
