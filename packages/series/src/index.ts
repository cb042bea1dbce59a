/**
 * @hostkit/series
 *
 * Cached lookup of the host operating system series.
 */

import { HostSeriesDetector, type SeriesResult } from './series.js';

export {
  GENERIC_LINUX_SERIES,
  HostSeriesDetector,
  MACOSX_SERIES,
  kernelToMajor,
  linuxSeriesFromOsRelease,
  macOSXSeriesFromKernelVersion,
  macOSXSeriesFromMajorVersion,
  nodeSources,
  parseOsRelease,
  readSeries,
} from './series.js';
export type { HostSeriesSources, SeriesResult } from './series.js';
export { Once } from './once.js';
export { ErrorCodes, SeriesError } from './errors.js';
export type { ErrorCode } from './errors.js';

/**
 * Detector for the current process
 */
export const hostSeriesDetector = new HostSeriesDetector();

export function hostSeries(): SeriesResult {
  return hostSeriesDetector.hostSeries();
}

export function mustHostSeries(): string {
  return hostSeriesDetector.mustHostSeries();
}
