/**
 * Host series detection
 *
 * The series names the OS release a host runs (an Ubuntu codename, a macOS
 * release name). It is read once per detector and cached, error included.
 *
 * @module @hostkit/series
 */

import { readFileSync } from 'node:fs';
import { platform, release } from 'node:os';
import { ErrorCodes, SeriesError } from './errors.js';
import { logger } from './logger.js';
import { Once } from './once.js';

export const GENERIC_LINUX_SERIES = 'genericlinux';

/**
 * Darwin kernel major version to macOS series
 */
export const MACOSX_SERIES: ReadonlyMap<number, string> = new Map([
  [19, 'catalina'],
  [18, 'mojave'],
  [17, 'highsierra'],
  [16, 'sierra'],
  [15, 'elcapitan'],
  [14, 'yosemite'],
  [13, 'mavericks'],
  [12, 'mountainlion'],
  [11, 'lion'],
  [10, 'snowleopard'],
  [9, 'leopard'],
  [8, 'tiger'],
  [7, 'panther'],
  [6, 'jaguar'],
  [5, 'puma'],
]);

export type SeriesResult = { ok: true; value: string } | { ok: false; error: SeriesError };

/**
 * Where the detector reads host facts from
 */
export interface HostSeriesSources {
  platform(): NodeJS.Platform;
  /** Kernel release string, e.g. "15.6.0" */
  kernelVersion(): string;
  /** Contents of /etc/os-release */
  readOsRelease(): string;
}

export const nodeSources: HostSeriesSources = {
  platform: () => platform(),
  kernelVersion: () => release(),
  readOsRelease: () => readFileSync('/etc/os-release', 'utf8'),
};

/**
 * Major component of a dotted kernel version.
 */
export function kernelToMajor(getKernelVersion: () => string): number {
  const fullVersion = getKernelVersion();
  const [major] = fullVersion.split('.', 1);
  if (!/^\d+$/.test(major)) {
    throw new SeriesError(
      ErrorCodes.KERNEL_VERSION_INVALID,
      `invalid kernel version "${fullVersion}"`
    );
  }
  return Number.parseInt(major, 10);
}

export function macOSXSeriesFromMajorVersion(majorVersion: number): SeriesResult {
  const series = MACOSX_SERIES.get(majorVersion);
  if (!series) {
    return {
      ok: false,
      error: new SeriesError(ErrorCodes.SERIES_UNKNOWN, `unknown series for Darwin ${majorVersion}`),
    };
  }
  return { ok: true, value: series };
}

export function macOSXSeriesFromKernelVersion(getKernelVersion: () => string): SeriesResult {
  let majorVersion: number;
  try {
    majorVersion = kernelToMajor(getKernelVersion);
  } catch (err) {
    logger.info({ err }, 'unable to determine OS version');
    return {
      ok: false,
      error:
        err instanceof SeriesError
          ? err
          : new SeriesError(ErrorCodes.KERNEL_VERSION_INVALID, 'cannot read kernel version', {
              cause: err,
            }),
    };
  }
  return macOSXSeriesFromMajorVersion(majorVersion);
}

/**
 * Parse os-release(5) content into key/value pairs.
 */
export function parseOsRelease(contents: string): Map<string, string> {
  const values = new Map<string, string>();
  for (const rawLine of contents.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    const key = line.slice(0, eq);
    const value = line.slice(eq + 1).replace(/^(["'])(.*)\1$/, '$2');
    values.set(key, value);
  }
  return values;
}

/**
 * Linux series from os-release: VERSION_CODENAME, then UBUNTU_CODENAME,
 * then the generic series.
 */
export function linuxSeriesFromOsRelease(contents: string): string {
  const values = parseOsRelease(contents);
  return values.get('VERSION_CODENAME') || values.get('UBUNTU_CODENAME') || GENERIC_LINUX_SERIES;
}

/**
 * Read the series of the host described by `sources`. Throws SeriesError.
 */
export function readSeries(sources: HostSeriesSources): string {
  const os = sources.platform();
  switch (os) {
    case 'darwin': {
      const result = macOSXSeriesFromKernelVersion(() => sources.kernelVersion());
      if (!result.ok) throw result.error;
      return result.value;
    }
    case 'linux':
      return linuxSeriesFromOsRelease(sources.readOsRelease());
    default:
      throw new SeriesError(ErrorCodes.OS_UNSUPPORTED, `unsupported operating system "${os}"`);
  }
}

function annotate(err: unknown): SeriesError {
  const reason = err instanceof Error ? err.message : String(err);
  return new SeriesError(ErrorCodes.SERIES_UNDETERMINED, `cannot determine host series: ${reason}`, {
    cause: err,
  });
}

/**
 * Cached host series lookup.
 */
export class HostSeriesDetector {
  private readonly series: Once<string>;

  constructor(sources: HostSeriesSources = nodeSources) {
    this.series = new Once(() => {
      try {
        return readSeries(sources);
      } catch (err) {
        throw annotate(err);
      }
    });
  }

  hostSeries(): SeriesResult {
    try {
      return { ok: true, value: this.series.get() };
    } catch (err) {
      return { ok: false, error: err instanceof SeriesError ? err : annotate(err) };
    }
  }

  /**
   * Like {@link hostSeries}, but throws the cached error.
   */
  mustHostSeries(): string {
    const result = this.hostSeries();
    if (!result.ok) throw result.error;
    return result.value;
  }
}
