// Path: src/services/force-rotate.ts
// Operator-triggered rotation across every live connection

import { createLogger } from '../lib/logger.js';
import { EventLogError, describeError } from '../utils/error.js';
import type { ConnectionRegistry } from './connection-registry.js';
import type { CidLifecycleManager } from './cid-lifecycle/index.js';

const log = createLogger({ module: 'force-rotate' });

export interface ForceRotateSummary {
  /** Connections in the snapshot, one attempt each */
  attempted: number;
  succeeded: number;
  failed: number;
}

/**
 * Rotate every registered connection, bypassing policy gating.
 *
 * Iterates a snapshot of the registry. An exception for one connection (for
 * example a handle torn down mid-close) is recorded as a failed manual
 * rotation and iteration continues. Event log failures are never recorded as
 * rotation failures: the first one is rethrown after every connection was
 * attempted.
 */
export async function forceRotateAll(
  registry: ConnectionRegistry,
  clm: CidLifecycleManager
): Promise<ForceRotateSummary> {
  const snapshot = registry.list();
  const summary: ForceRotateSummary = { attempted: 0, succeeded: 0, failed: 0 };
  let sinkError: unknown = null;

  log.info({ connections: snapshot.length }, 'Forcing rotation on all connections');

  for (const connection of snapshot) {
    summary.attempted++;
    try {
      const outcome = await clm.forceRotate(connection.handle, 'manual', connection.id);
      if (outcome.success) {
        summary.succeeded++;
      } else {
        summary.failed++;
      }
    } catch (err) {
      if (err instanceof EventLogError) {
        // The rotation may well have happened; only its record was lost
        sinkError ??= err;
        continue;
      }
      summary.failed++;
      log.warn({ err, connectionId: connection.id }, 'Forced rotation raised');
      try {
        await clm.recordFailure(`force rotate raised: ${describeError(err)}`, 'manual', connection.id);
      } catch (recordErr) {
        sinkError ??= recordErr;
      }
    }
  }

  if (sinkError !== null) {
    throw sinkError;
  }

  log.info(summary, 'Forced rotation complete');
  return summary;
}
