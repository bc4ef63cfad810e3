/**
 * Server API version compatibility
 */
import pLimit from 'p-limit';
import { UnsupportedApiVersionError } from './errors.mjs';
import type { Logger } from './types.mjs';

export interface ParsedVersion {
  major: number;
  minor: number;
  patch: number;
  prerelease?: string;
}

const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)(?:-([0-9A-Za-z.-]+))?$/;

/**
 * Parse `major.minor.patch[-prerelease]`. Anything else is 0.0.0.
 */
export function parseVersion(version: string): ParsedVersion {
  const match = VERSION_PATTERN.exec(version.trim());
  if (!match) {
    return { major: 0, minor: 0, patch: 0 };
  }

  const [, major, minor, patch, prerelease] = match;
  return {
    major: parseInt(major, 10),
    minor: parseInt(minor, 10),
    patch: parseInt(patch, 10),
    ...(prerelease ? { prerelease } : {}),
  };
}

/**
 * Compare two versions on major, minor, patch. Prerelease tags are ignored.
 *
 * @returns -1, 0 or 1
 */
export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  const left = parseVersion(a);
  const right = parseVersion(b);

  for (const part of ['major', 'minor', 'patch'] as const) {
    if (left[part] < right[part]) return -1;
    if (left[part] > right[part]) return 1;
  }
  return 0;
}

export interface VersionRange {
  minVersion: string;
  maxKnownVersion: string;
}

/**
 * Fail when the server is older than this SDK supports; warn when it is a
 * newer major than the SDK knows about.
 *
 * @throws UnsupportedApiVersionError
 */
export function checkApiVersionCompatibility(
  serverVersion: string,
  logger: Logger,
  range: VersionRange
): void {
  if (compareVersions(serverVersion, range.minVersion) < 0) {
    throw new UnsupportedApiVersionError(serverVersion, range.minVersion);
  }

  if (parseVersion(serverVersion).major > parseVersion(range.maxKnownVersion).major) {
    logger.warn('API version is newer than this SDK was built for; some features may not work', {
      serverVersion,
      maxKnownVersion: range.maxKnownVersion,
    });
  }
}

/**
 * One-shot version check shared by every call on a client.
 *
 * The flag flips before the check runs, so exactly one caller evaluates the
 * header (and sees its error); every other caller skips.
 */
export class VersionGate {
  private checked = false;
  private readonly lock = pLimit(1);

  constructor(
    private readonly logger: Logger,
    private readonly range: VersionRange
  ) {}

  get isChecked(): boolean {
    return this.checked;
  }

  async checkOnce(headerValue: string | undefined): Promise<void> {
    if (this.checked) {
      return;
    }

    await this.lock(() => {
      if (this.checked) {
        return;
      }
      this.checked = true;

      if (!headerValue) {
        this.logger.warn('API did not return an X-API-Version header');
        return;
      }
      checkApiVersionCompatibility(headerValue, this.logger, this.range);
    });
  }
}
