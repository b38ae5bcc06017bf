import 'dotenv/config';

import { IS_PRODUCTION, validateEnvironmentVariables } from './config.js';

import db from './database/db.js';
import { runMigrations } from './database/migration-runner.js';
import { Logger } from './logger.js';
import { loadScheduleIntervalService } from './shifts/schedule.loader.js';
import type { ScheduleIntervalService } from './shifts/schedule.service.js';
import { InvalidRangeError } from './shifts/shift.errors.js';
import type { IntervalBounds, ResolvedInterval } from './shifts/shift.types.js';
import { ScheduleTask, type ScheduleTaskEvent, type ScheduleTaskResponse } from './tasks.types.js';

const logger = new Logger('main');

export async function handler(event?: ScheduleTaskEvent): Promise<ScheduleTaskResponse> {
  if (!event) {
    logger.error('Required `event` parameter is missing (see `ScheduleTaskEvent` in tasks.types.ts).');
    return {
      statusCode: 400,
      body: JSON.stringify({
        error: 'Required `event` parameter is missing (see `ScheduleTaskEvent` in tasks.types.ts).',
      }),
    };
  }

  const envValidation = validateEnvironmentVariables(IS_PRODUCTION);
  if (!envValidation.valid) {
    const errorMessage = [
      envValidation.missing.length > 0 ? `Missing: ${envValidation.missing.join(', ')}` : null,
      envValidation.invalid.length > 0 ? `Invalid: ${envValidation.invalid.join(', ')}` : null,
    ]
      .filter((part) => part !== null)
      .join('. ');
    logger.error(`Environment is not configured correctly. ${errorMessage}`);
    return {
      statusCode: 500,
      body: JSON.stringify({
        error: 'Configuration error',
        details: errorMessage,
      }),
    };
  }

  try {
    runMigrations(db);
    const service = loadScheduleIntervalService();
    const result = runTask(event, service);

    return {
      statusCode: 200,
      body: JSON.stringify({
        message: 'Schedule task completed successfully',
        result,
      }),
    };
  } catch (error) {
    if (error instanceof InvalidRangeError) {
      logger.warn('Rejected query window', { windowStart: error.windowStart, windowFinish: error.windowFinish });
      return {
        statusCode: 400,
        body: JSON.stringify({ error: 'Invalid range', details: error.message }),
      };
    }

    logger.error('Error running task:', error);
    return {
      statusCode: 500,
      body: JSON.stringify({
        error: 'Schedule task failed.',
        details: error instanceof Error ? error.message : 'Unknown error',
      }),
    };
  }
}

// For direct execution
if (import.meta.url === new URL(process.argv[1], 'file://').href) {
  handler({ task: ScheduleTask.VERIFY_INDEX })
    .then((response) => logger.info('Index verification finished', response))
    .catch((error) => logger.error('Index verification failed', error))
    .finally(() => logger.flush());
}

function serializeBounds(bounds: IntervalBounds): { start_at: string | null; finish_at: string | null } {
  return { start_at: bounds.start_at.toISO(), finish_at: bounds.finish_at.toISO() };
}

/** Joins each interval back to its allocation's assignees for presentation. */
function serializeIntervals(service: ScheduleIntervalService, intervals: ResolvedInterval[]) {
  return intervals.map((interval) => ({
    allocation_id: interval.allocation_id,
    shift_id: interval.shift_id,
    ...serializeBounds(interval),
    assignees: service.getAllocation(interval.allocation_id)?.assignees ?? [],
  }));
}

function runTask(event: ScheduleTaskEvent, service: ScheduleIntervalService): unknown {
  switch (event.task) {
    case ScheduleTask.ACTIVE_AT:
      return {
        instant: event.instant,
        allocations: serializeIntervals(service, service.activeIntervalsAt(event.instant)),
      };
    case ScheduleTask.OVERLAPPING:
      return {
        window_start: event.window_start,
        window_finish: event.window_finish,
        allocations: serializeIntervals(service, service.overlappingIntervals(event.window_start, event.window_finish)),
      };
    case ScheduleTask.VERIFY_INDEX: {
      const verification = service.verify();
      return {
        consistent: verification.consistent,
        checked: verification.checked,
        discrepancies: verification.discrepancies.map((discrepancy) => ({
          kind: discrepancy.kind,
          allocation_id: discrepancy.allocation_id,
          expected: discrepancy.expected ? serializeBounds(discrepancy.expected) : null,
          actual: discrepancy.actual ? serializeBounds(discrepancy.actual) : null,
        })),
      };
    }
    default: {
      const unhandled: never = event;
      logger.error('Unhandled event `task`.', unhandled);
      throw new Error('Unhandled event task');
    }
  }
}
