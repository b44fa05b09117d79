// Path: src/services/connection-registry.test.ts

import { describe, it, expect } from 'vitest';
import { ConnectionRegistry } from './connection-registry.js';
import { SimulatedConnection } from '../lib/transport/simulated.js';

describe('ConnectionRegistry', () => {
  it('should track membership from accept to close', () => {
    const registry = new ConnectionRegistry();
    const a = new SimulatedConnection('conn-1', '127.0.0.1:50001', 'manager-rotate');
    const b = new SimulatedConnection('conn-2', '127.0.0.1:50002', 'manager-rotate');

    registry.registerOnAccept(a);
    registry.registerOnAccept(b);
    expect(registry.size).toBe(2);
    expect(registry.has('conn-1')).toBe(true);

    expect(registry.unregisterOnClose(a)).toBe(true);
    expect(registry.size).toBe(1);
    expect(registry.has('conn-1')).toBe(false);
  });

  it('should report unregistering an unknown connection', () => {
    const registry = new ConnectionRegistry();
    const a = new SimulatedConnection('conn-1', '127.0.0.1:50001', 'none');
    expect(registry.unregisterOnClose(a)).toBe(false);
  });

  it('should keep one entry per connection ID', () => {
    const registry = new ConnectionRegistry();
    const first = new SimulatedConnection('conn-1', '127.0.0.1:50001', 'none');
    const second = new SimulatedConnection('conn-1', '127.0.0.1:50009', 'none');

    registry.registerOnAccept(first);
    registry.registerOnAccept(second);

    expect(registry.size).toBe(1);
    expect(registry.list()[0].remoteAddress).toBe('127.0.0.1:50009');
  });

  it('should return a snapshot unaffected by later changes', () => {
    const registry = new ConnectionRegistry();
    const a = new SimulatedConnection('conn-1', '127.0.0.1:50001', 'none');
    const b = new SimulatedConnection('conn-2', '127.0.0.1:50002', 'none');
    registry.registerOnAccept(a);
    registry.registerOnAccept(b);

    const snapshot = registry.list();
    registry.unregisterOnClose(a);

    expect(snapshot.map((c) => c.id)).toEqual(['conn-1', 'conn-2']);
    expect(registry.list().map((c) => c.id)).toEqual(['conn-2']);
  });
});
