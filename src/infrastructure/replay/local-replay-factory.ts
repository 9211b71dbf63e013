import { inject, singleton } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { FeatureRequest, FeatureSetSpec, FeatureSpec } from '../../domain/spec/feature-spec.js';
import { conformsTo, detectPrimitive } from '../../domain/spec/primitives.js';
import type { HistoricalSourceError } from '../../ports/historical-value-source.port.js';
import type {
  HistoricalGet,
  HistoricalRow,
  Replay,
  ReplayError,
  ReplayFactory,
  ReplayRow,
} from '../../ports/replay-factory.port.js';
import type { TimeClockPort } from '../../ports/time-clock.port.js';

/**
 * Runs replays in process.
 *
 * - replay: executes the feature's program once per request, in order
 * - historicalGet: reads every feature of a set from a value source, one
 *   row per query, columns in the set's order
 *
 * Fails on the first bad request; no partial result is returned.
 */
@singleton()
export class LocalReplayFactory implements ReplayFactory {
  constructor(@inject(DI.Infra.Clock) private readonly clock: TimeClockPort) {}

  newReplay(spec: FeatureSpec): Replay {
    return (requests) => {
      const rows: ReplayRow[] = [];

      for (const [index, request] of requests.entries()) {
        const missing = spec.keys.find((key) => request.keys[key] === undefined);
        if (missing !== undefined) {
          return err({
            code: 'REPLAY_MISSING_KEY',
            index,
            key: missing,
            message: `request ${index} of ${spec.fqn} is missing key '${missing}'`,
          });
        }

        const timestamp = request.timestamp ?? this.clock.now();
        const value = runProgram(spec, index, {
          keys: request.keys,
          timestamp,
          dependencies: request.dependencies ?? {},
        });
        if (value.isErr()) return err(value.error);

        // no value for this request
        if (value.value === undefined || value.value === null) continue;

        if (!conformsTo(value.value, spec.primitive)) {
          const actual = detectPrimitive(value.value);
          return err({
            code: 'REPLAY_TYPE_MISMATCH',
            index,
            expected: spec.primitive,
            actual,
            message: `request ${index} of ${spec.fqn} produced ${actual}, expected ${spec.primitive}`,
          });
        }

        rows.push({ fqn: spec.fqn, keys: request.keys, timestamp, value: value.value });
      }

      return ok(rows);
    };
  }

  newHistoricalGet(spec: FeatureSetSpec): HistoricalGet {
    return (queries, source) => {
      const rows: HistoricalRow[] = [];

      for (const query of queries) {
        const values: Record<string, unknown> = {};
        for (const fqn of spec.features) {
          const res: Result<unknown, HistoricalSourceError> = source.valueAt(fqn, query.keys, query.timestamp);
          if (res.isErr()) return err(res.error);
          values[fqn] = res.value;
        }
        rows.push({ keys: query.keys, timestamp: query.timestamp, columns: spec.features, values });
      }

      return ok(rows);
    };
  }
}

function runProgram(
  spec: FeatureSpec,
  index: number,
  request: FeatureRequest
): Result<unknown, ReplayError> {
  try {
    return ok(spec.program.run(request));
  } catch (cause) {
    return err({
      code: 'REPLAY_HANDLER_FAILED',
      index,
      cause,
      message: `request ${index} of ${spec.fqn} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
    });
  }
}
