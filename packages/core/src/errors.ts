/**
 * Failures that leave a pipeline stage. Per-source skips and failures are
 * attempt outcomes, not exceptions.
 */

import type { ResolutionAttempt } from './types/index';

export class NoArtworkError extends Error {
  readonly attempts: ResolutionAttempt[];

  constructor(attempts: ResolutionAttempt[]) {
    super(`No artwork available after ${attempts.length} attempt(s)`);
    this.name = 'NoArtworkError';
    this.attempts = attempts;
  }
}

export class DeviceUnreachableError extends Error {
  readonly host: string;

  constructor(host: string, reason: string) {
    super(`Device ${host} unreachable: ${reason}`);
    this.name = 'DeviceUnreachableError';
    this.host = host;
  }
}

export class LightUpdateError extends Error {
  readonly target: string;

  constructor(target: string, reason: string) {
    super(`Light ${target} update failed: ${reason}`);
    this.name = 'LightUpdateError';
    this.target = target;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RunSupersededError extends Error {
  constructor() {
    super('run superseded by a newer state change');
    this.name = 'RunSupersededError';
  }
}
