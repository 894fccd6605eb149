export type CascadeSource = 'instance_config' | 'account_config' | 'global_config' | 'hardcoded_fallback';

export interface CascadeAttempt {
  source: CascadeSource;
  path: string | null;
  found: boolean;
  value?: unknown;
  reason?: string;
}

/**
 * Record of one parameter resolution: every source consulted, what it held,
 * and which source finally supplied the value.
 */
export class CascadeAuditTrail {
  private readonly attempts: CascadeAttempt[] = [];
  private resolvedSource: CascadeSource | null = null;
  private resolvedValue: unknown = undefined;

  constructor(
    readonly parameterName: string,
    readonly agentType: string,
    readonly accountSlug?: string,
    readonly instanceSlug?: string
  ) {}

  recordAttempt(attempt: CascadeAttempt): void {
    this.attempts.push(attempt);
  }

  resolve(value: unknown, source: CascadeSource): void {
    this.resolvedValue = value;
    this.resolvedSource = source;
  }

  getAttempts(): CascadeAttempt[] {
    return [...this.attempts];
  }

  get source(): CascadeSource | null {
    return this.resolvedSource;
  }

  get usedFallback(): boolean {
    return this.resolvedSource === 'hardcoded_fallback';
  }

  /** Attempts that found nothing usable before the winning source. */
  get failedAttempts(): CascadeAttempt[] {
    return this.attempts.filter(attempt => !attempt.found || attempt.reason !== undefined);
  }

  private get target(): string {
    if (this.accountSlug && this.instanceSlug) {
      return `${this.accountSlug}/${this.instanceSlug}`;
    }
    return this.agentType;
  }

  log(): void {
    if (this.usedFallback) {
      console.warn(
        `[cascade] ${this.target}: ${this.parameterName} fell back to hardcoded value ${JSON.stringify(this.resolvedValue)}`,
        { attempts: this.attempts }
      );
      return;
    }

    const failed = this.failedAttempts.filter(attempt => attempt.source !== this.resolvedSource);
    if (failed.length > 0) {
      console.log(
        `[cascade] ${this.target}: ${this.parameterName} resolved from ${this.resolvedSource} after ${failed.length} skipped source(s)`
      );
    }
  }

  troubleshootingGuide(): string[] {
    const hints: string[] = [];
    for (const attempt of this.failedAttempts) {
      if (attempt.source === 'hardcoded_fallback') continue;
      const where = attempt.path ?? attempt.source;
      if (attempt.reason) {
        hints.push(`${attempt.source}: ${attempt.reason} (${where})`);
      } else {
        hints.push(`${attempt.source}: no value for ${this.parameterName} (${where})`);
      }
    }
    if (this.usedFallback) {
      hints.push(
        `Set ${this.parameterName} in the instance config.yaml or account.yaml to stop using the hardcoded fallback`
      );
    }
    return hints;
  }

  toJSON(): Record<string, unknown> {
    return {
      parameter: this.parameterName,
      agentType: this.agentType,
      accountSlug: this.accountSlug ?? null,
      instanceSlug: this.instanceSlug ?? null,
      source: this.resolvedSource,
      value: this.resolvedValue,
      attempts: this.attempts,
    };
  }
}
