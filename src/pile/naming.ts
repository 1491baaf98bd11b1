import { PatchNamingExhaustedError } from "../core/errors.js";

const SERIES_NUMBER_PREFIX = /^\d+-/;

/** `0003-Fix-bug.patch` -> `Fix-bug.patch` */
export function stripSeriesNumber(fileName: string): string {
  const stripped = fileName.replace(SERIES_NUMBER_PREFIX, "");
  return stripped.length > 0 ? stripped : fileName;
}

/** `Fix-bug.patch`, 2 -> `Fix-bug-2.patch` */
export function withNumericSuffix(fileName: string, suffix: number): string {
  const dot = fileName.lastIndexOf(".");
  if (dot <= 0) return `${fileName}-${suffix}`;
  return `${fileName.slice(0, dot)}-${suffix}${fileName.slice(dot)}`;
}

/**
 * Hands out unique file names within one pile. A name already taken gets the
 * first free numeric suffix, trying at most `retryLimit` suffixes.
 */
export class PatchNameAllocator {
  private readonly taken = new Set<string>();

  constructor(private readonly retryLimit: number) {}

  allocate(preferred: string): string {
    if (!this.taken.has(preferred)) {
      this.taken.add(preferred);
      return preferred;
    }

    for (let attempt = 1; attempt <= this.retryLimit; attempt += 1) {
      const candidate = withNumericSuffix(preferred, attempt);
      if (!this.taken.has(candidate)) {
        this.taken.add(candidate);
        return candidate;
      }
    }

    throw new PatchNamingExhaustedError(preferred, this.retryLimit);
  }
}
