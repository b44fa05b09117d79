// Path: src/services/cid-lifecycle/resolver.ts
// Strategy chain for rotating a connection ID against an untrusted surface

import { createLogger } from '../../lib/logger.js';
import { describeError } from '../../utils/error.js';
import { withTimeout } from '../../utils/timer.js';
import type { RotationOperation, RotationSurface } from './surface.js';
import { renderValue } from './surface.js';
import {
  DEFAULT_STRATEGY_TIMEOUT_MS,
  NO_ROTATION_SURFACE_NOTE,
  type RotationDetail,
  type RotationOutcome,
} from './types.js';

const log = createLogger({ module: 'rotation-resolver' });

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

export interface RotationStrategyResolverOptions {
  /** Bound on operations that return a promise */
  timeoutMs?: number;
}

/**
 * Attempts a connection-ID rotation through the first applicable strategy.
 *
 * Priority order:
 * 1. A: `<manager>.rotate()` on the first attached manager exposing it
 * 2. B: `<manager>.<issue op>()` - only if no manager exposes rotate
 * 3. C: `endpoint.<change op>()` - only if no manager operation exists
 * 4. Fallback: fail with a diagnostic snapshot of the endpoint
 *
 * The first operation found is final whether or not the call succeeds.
 * attemptRotation() never rejects.
 */
export class RotationStrategyResolver {
  private readonly timeoutMs: number;

  constructor(options: RotationStrategyResolverOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_STRATEGY_TIMEOUT_MS;
  }

  async attemptRotation(surface: RotationSurface): Promise<RotationOutcome> {
    const detail: RotationDetail = { strategy: null, found: [], note: '' };

    let operation: RotationOperation | undefined;
    try {
      detail.found = surface.discoverManagers();
      operation = surface.findRotate() ?? surface.findIssue() ?? surface.findDirectChange();

      if (!operation) {
        Object.assign(detail, surface.snapshotDiagnostics());
      }
    } catch (err) {
      // Endpoints torn down mid-probe can throw from their accessors
      detail.note = `probe raised: ${describeError(err)}`;
      log.debug({ err, found: detail.found }, 'Rotation surface probe failed');
      return { success: false, detail };
    }

    if (!operation) {
      detail.note = NO_ROTATION_SURFACE_NOTE;
      return { success: false, detail };
    }

    return this.invoke(operation, detail);
  }

  private async invoke(operation: RotationOperation, detail: RotationDetail): Promise<RotationOutcome> {
    detail.strategy = operation.strategy;

    try {
      let result = operation.invoke();
      if (isPromiseLike(result)) {
        result = await withTimeout(
          result,
          this.timeoutMs,
          `${operation.name}() did not settle within ${this.timeoutMs}ms`
        );
      }

      if (operation.kind === 'issue') {
        detail.issued = renderValue(result);
      }
      return { success: true, detail };
    } catch (err) {
      detail.note = `${operation.name}() raised: ${describeError(err)}`;
      return { success: false, detail };
    }
  }
}
