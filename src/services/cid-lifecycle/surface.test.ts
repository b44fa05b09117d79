// Path: src/services/cid-lifecycle/surface.test.ts

import { describe, it, expect } from 'vitest';
import {
  ProbingRotationSurface,
  hasProperty,
  readNewestHostCid,
  readProperty,
  renderValue,
  toHex,
} from './surface.js';

describe('property helpers', () => {
  it('should read own and inherited properties', () => {
    class Base {
      get inherited(): number {
        return 1;
      }
    }
    const target = Object.assign(new Base(), { own: 2 });
    expect(readProperty(target, 'own')).toBe(2);
    expect(readProperty(target, 'inherited')).toBe(1);
    expect(readProperty(target, 'missing')).toBeUndefined();
  });

  it('should treat primitives and null as having no properties', () => {
    expect(readProperty(null, 'x')).toBeUndefined();
    expect(readProperty('text', 'length')).toBeUndefined();
    expect(hasProperty(undefined, 'x')).toBe(false);
  });

  it('should report properties that are present but null', () => {
    expect(hasProperty({ cidManager: null }, 'cidManager')).toBe(true);
  });
});

describe('rendering', () => {
  it('should render bytes as lowercase hex', () => {
    expect(toHex(Buffer.from([0xab, 0x01]))).toBe('ab01');
    expect(toHex(new Uint8Array([0xff, 0x00, 0x10]))).toBe('ff0010');
    expect(toHex('abc')).toBeNull();
  });

  it('should render a subarray without its parent buffer', () => {
    const parent = new Uint8Array([1, 2, 3, 4]);
    expect(toHex(parent.subarray(1, 3))).toBe('0203');
  });

  it('should fall back to String() for other values', () => {
    expect(renderValue(42)).toBe('42');
    expect(renderValue(null)).toBe('null');
    expect(renderValue(undefined)).toBe('undefined');
  });
});

describe('readNewestHostCid', () => {
  it('should pick the entry with the highest sequence number', () => {
    const endpoint = {
      hostCids: [
        { cid: Buffer.from('aa', 'hex'), sequenceNumber: 0 },
        { cid: Buffer.from('cc', 'hex'), sequenceNumber: 2 },
        { cid: Buffer.from('bb', 'hex'), sequenceNumber: 1 },
      ],
    };
    expect(readNewestHostCid(endpoint)).toBe('cc');
  });

  it('should return null without a host CID list', () => {
    expect(readNewestHostCid({})).toBeNull();
    expect(readNewestHostCid({ hostCids: [] })).toBeNull();
  });

  it('should return null when the handle throws', () => {
    const endpoint = {
      get hostCids(): never {
        throw new Error('closed');
      },
    };
    expect(readNewestHostCid(endpoint)).toBeNull();
  });
});

describe('ProbingRotationSurface', () => {
  it('should list every manager name present, attached or not', () => {
    const surface = new ProbingRotationSurface({ cidManager: null, connectionIdManager: {} });
    expect(surface.discoverManagers()).toEqual(['cidManager', 'connectionIdManager']);
  });

  it('should find rotate on the first attached manager that has it', () => {
    const endpoint = {
      localCidManager: null,
      cidManager: { issue: () => 1 },
      connectionIdManager: { rotate: () => 'rotated' },
    };
    const operation = new ProbingRotationSurface(endpoint).findRotate();
    expect(operation?.strategy).toBe('connectionIdManager.rotate()');
    expect(operation?.invoke()).toBe('rotated');
  });

  it('should bind rotate to its manager', () => {
    const manager = {
      calls: 0,
      rotate(): number {
        this.calls++;
        return this.calls;
      },
    };
    const operation = new ProbingRotationSurface({ cidManager: manager }).findRotate();
    operation?.invoke();
    expect(manager.calls).toBe(1);
  });

  it('should find issue operations in priority order per manager', () => {
    const endpoint = {
      cidManager: { new: () => 'n', issue: () => 'i' },
    };
    const operation = new ProbingRotationSurface(endpoint).findIssue();
    expect(operation?.kind).toBe('issue');
    expect(operation?.name).toBe('issue');
    expect(operation?.strategy).toBe('cidManager.issue()');
  });

  it('should ignore non-callable members', () => {
    const endpoint = {
      cidManager: { rotate: 'not a function' },
      changeConnectionId: 5,
    };
    const surface = new ProbingRotationSurface(endpoint);
    expect(surface.findRotate()).toBeUndefined();
    expect(surface.findDirectChange()).toBeUndefined();
  });

  it('should find endpoint-level change operations', () => {
    const endpoint = { requestConnectionId: () => true, rotateConnectionId: () => true };
    const operation = new ProbingRotationSurface(endpoint).findDirectChange();
    expect(operation?.strategy).toBe('endpoint.rotateConnectionId()');
  });

  it('should snapshot diagnostic fields with null for absent ones', () => {
    const endpoint = { localCid: Buffer.from([0xde, 0xad]), hostCid: 7 };
    expect(new ProbingRotationSurface(endpoint).snapshotDiagnostics()).toEqual({
      localCid: 'dead',
      originalDestinationCid: null,
      hostCid: '7',
    });
  });

  it('should accept custom probe names', () => {
    const endpoint = { scid: { rotate: () => 1 } };
    const surface = new ProbingRotationSurface(endpoint, { managers: ['scid'] });
    expect(surface.discoverManagers()).toEqual(['scid']);
    expect(surface.findRotate()?.strategy).toBe('scid.rotate()');
  });
});
