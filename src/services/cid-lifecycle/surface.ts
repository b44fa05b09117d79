// Path: src/services/cid-lifecycle/surface.ts
// Capability interface over an endpoint's connection-ID management surface

import {
  DIAGNOSTIC_FIELDS,
  DIRECT_OPERATION_NAMES,
  ISSUE_OPERATION_NAMES,
  MANAGER_ATTACHMENT_NAMES,
  type DiagnosticSnapshot,
} from './types.js';

export type RotationOperationKind = 'rotate' | 'issue' | 'direct';

/**
 * A zero-argument operation located on an endpoint, ready to invoke.
 */
export interface RotationOperation {
  kind: RotationOperationKind;
  /** Operation name, used in failure notes */
  name: string;
  /** Label recorded as detail.strategy, e.g. `cidManager.issue()` */
  strategy: string;
  /** May return a value or a promise */
  invoke(): unknown;
}

/**
 * What the resolver needs from a transport endpoint. Each finder returns the
 * first operation of its kind, or undefined when the endpoint has none.
 */
export interface RotationSurface {
  discoverManagers(): string[];
  findRotate(): RotationOperation | undefined;
  findIssue(): RotationOperation | undefined;
  findDirectChange(): RotationOperation | undefined;
  snapshotDiagnostics(): DiagnosticSnapshot;
}

export interface ProbeNames {
  managers: readonly string[];
  issueOperations: readonly string[];
  directOperations: readonly string[];
}

const DEFAULT_PROBE_NAMES: ProbeNames = {
  managers: MANAGER_ATTACHMENT_NAMES,
  issueOperations: ISSUE_OPERATION_NAMES,
  directOperations: DIRECT_OPERATION_NAMES,
};

/**
 * Read a named property (own or inherited) from an opaque value.
 * Returns undefined for primitives and missing names.
 */
export function readProperty(target: unknown, name: string): unknown {
  if ((typeof target !== 'object' && typeof target !== 'function') || target === null) {
    return undefined;
  }
  if (!(name in target)) {
    return undefined;
  }
  return Reflect.get(target, name);
}

/**
 * Whether an opaque value carries the named property at all, even if null.
 */
export function hasProperty(target: unknown, name: string): boolean {
  if ((typeof target !== 'object' && typeof target !== 'function') || target === null) {
    return false;
  }
  return name in target;
}

/**
 * Bind a named callable on an opaque value, or undefined if absent/not callable.
 */
function bindMethod(target: unknown, name: string): (() => unknown) | undefined {
  const value = readProperty(target, name);
  if (typeof value !== 'function') {
    return undefined;
  }
  return () => Reflect.apply(value, target, []);
}

/**
 * Render byte-like values as lowercase hex.
 */
export function toHex(value: unknown): string | null {
  if (value instanceof Uint8Array) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('hex');
  }
  if (value instanceof ArrayBuffer) {
    return Buffer.from(value).toString('hex');
  }
  return null;
}

/**
 * Render an arbitrary returned or diagnostic value: hex for bytes, String() otherwise.
 */
export function renderValue(value: unknown): string {
  return toHex(value) ?? String(value);
}

/**
 * Newest outbound CID of an endpoint that keeps a `hostCids` list of
 * `{ cid, sequenceNumber }` entries, in hex. Null when the endpoint has none.
 */
export function readNewestHostCid(endpoint: unknown): string | null {
  try {
    const hostCids = readProperty(endpoint, 'hostCids');
    if (!Array.isArray(hostCids) || hostCids.length === 0) {
      return null;
    }

    let newest: unknown = null;
    let newestSequence = -1;
    for (const entry of hostCids) {
      const sequence = readProperty(entry, 'sequenceNumber');
      const rank = typeof sequence === 'number' ? sequence : -1;
      if (newest === null || rank > newestSequence) {
        newest = entry;
        newestSequence = rank;
      }
    }

    return toHex(readProperty(newest, 'cid'));
  } catch {
    // Reporting only; a handle that throws here simply has no readable CID
    return null;
  }
}

/**
 * RotationSurface adapter that discovers operations on an opaque endpoint
 * handle by name. This is the only place that duck-types transport objects.
 */
export class ProbingRotationSurface implements RotationSurface {
  private readonly names: ProbeNames;

  constructor(
    private readonly endpoint: unknown,
    names: Partial<ProbeNames> = {}
  ) {
    this.names = { ...DEFAULT_PROBE_NAMES, ...names };
  }

  discoverManagers(): string[] {
    return this.names.managers.filter((name) => hasProperty(this.endpoint, name));
  }

  findRotate(): RotationOperation | undefined {
    for (const { name, manager } of this.managers()) {
      const invoke = bindMethod(manager, 'rotate');
      if (invoke) {
        return { kind: 'rotate', name: 'rotate', strategy: `${name}.rotate()`, invoke };
      }
    }
    return undefined;
  }

  findIssue(): RotationOperation | undefined {
    for (const { name, manager } of this.managers()) {
      for (const operation of this.names.issueOperations) {
        const invoke = bindMethod(manager, operation);
        if (invoke) {
          return { kind: 'issue', name: operation, strategy: `${name}.${operation}()`, invoke };
        }
      }
    }
    return undefined;
  }

  findDirectChange(): RotationOperation | undefined {
    for (const operation of this.names.directOperations) {
      const invoke = bindMethod(this.endpoint, operation);
      if (invoke) {
        return { kind: 'direct', name: operation, strategy: `endpoint.${operation}()`, invoke };
      }
    }
    return undefined;
  }

  snapshotDiagnostics(): DiagnosticSnapshot {
    const snapshot: DiagnosticSnapshot = {
      localCid: null,
      originalDestinationCid: null,
      hostCid: null,
    };
    for (const field of DIAGNOSTIC_FIELDS) {
      if (hasProperty(this.endpoint, field)) {
        snapshot[field] = renderValue(readProperty(this.endpoint, field));
      }
    }
    return snapshot;
  }

  /** Discovered managers that are actually attached (not null/undefined) */
  private managers(): { name: string; manager: unknown }[] {
    const attached: { name: string; manager: unknown }[] = [];
    for (const name of this.names.managers) {
      const manager = readProperty(this.endpoint, name);
      if (manager !== null && manager !== undefined) {
        attached.push({ name, manager });
      }
    }
    return attached;
  }
}
