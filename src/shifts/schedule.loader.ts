import { loadScheduleSnapshot } from '../database/queries.js';
import { Logger } from '../logger.js';
import { ScheduleIntervalService, type ScheduleIntervalServiceOptions } from './schedule.service.js';

const logger = new Logger('schedule-loader');

/** Reads the persisted shifts and allocations and builds a service over them. */
export function loadScheduleIntervalService(options?: ScheduleIntervalServiceOptions): ScheduleIntervalService {
  const startTime = Date.now();
  const service = ScheduleIntervalService.fromSnapshot(loadScheduleSnapshot(), options);
  logger.info(`Interval index ready in ${Date.now() - startTime}ms`, service.stats);
  return service;
}
