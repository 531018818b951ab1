import type { Logger } from 'pino';

export type AuthAttemptStatus = 'success' | 'expired' | 'invalid' | 'error';
export type TokenValidationStatus = 'valid' | 'expired' | 'invalid' | 'error';
export type ProviderOperation = 'validate_token' | 'login';

/** Fire-and-forget observability sink for the authentication path. */
export interface AuthMetrics {
  recordCacheHit(): void;
  recordCacheMiss(): void;
  recordAuthAttempt(status: AuthAttemptStatus): void;
  recordTokenValidation(status: TokenValidationStatus): void;
  recordProviderDuration(operation: ProviderOperation, seconds: number): void;
}

export const noopAuthMetrics: AuthMetrics = {
  recordCacheHit() {},
  recordCacheMiss() {},
  recordAuthAttempt() {},
  recordTokenValidation() {},
  recordProviderDuration() {},
};

/** Runs a metrics call; a failing sink is logged and never reaches the caller. */
export function recordSafely(log: Logger, record: () => void): void {
  try {
    record();
  } catch (error) {
    log.debug({ err: error }, 'Metrics sink failed; ignoring');
  }
}

const DURATION_BUCKETS = [0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5];

type Hist = { count: number; sum: number; buckets: number[] };

function escapeLabel(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

export class PrometheusAuthMetrics implements AuthMetrics {
  private cacheHits = 0;
  private cacheMisses = 0;
  private readonly authAttempts = new Map<AuthAttemptStatus, number>();
  private readonly tokenValidations = new Map<TokenValidationStatus, number>();
  private readonly providerDurations = new Map<ProviderOperation, Hist>();

  recordCacheHit(): void {
    this.cacheHits += 1;
  }

  recordCacheMiss(): void {
    this.cacheMisses += 1;
  }

  recordAuthAttempt(status: AuthAttemptStatus): void {
    this.authAttempts.set(status, (this.authAttempts.get(status) ?? 0) + 1);
  }

  recordTokenValidation(status: TokenValidationStatus): void {
    this.tokenValidations.set(status, (this.tokenValidations.get(status) ?? 0) + 1);
  }

  recordProviderDuration(operation: ProviderOperation, seconds: number): void {
    const hist = this.providerDurations.get(operation) ?? {
      count: 0,
      sum: 0,
      buckets: Array<number>(DURATION_BUCKETS.length).fill(0),
    };
    hist.count += 1;
    hist.sum += seconds;
    for (let i = 0; i < DURATION_BUCKETS.length; i++) {
      if (seconds <= DURATION_BUCKETS[i]) {
        hist.buckets[i] += 1;
        break;
      }
    }
    this.providerDurations.set(operation, hist);
  }

  render(): string {
    const lines: string[] = [];

    lines.push('# HELP gateway_auth_token_cache_hits_total Total number of token cache hits');
    lines.push('# TYPE gateway_auth_token_cache_hits_total counter');
    lines.push(`gateway_auth_token_cache_hits_total ${this.cacheHits}`);

    lines.push('# HELP gateway_auth_token_cache_misses_total Total number of token cache misses');
    lines.push('# TYPE gateway_auth_token_cache_misses_total counter');
    lines.push(`gateway_auth_token_cache_misses_total ${this.cacheMisses}`);

    lines.push('# HELP gateway_auth_attempts_total Total number of authentication attempts');
    lines.push('# TYPE gateway_auth_attempts_total counter');
    for (const [status, value] of this.authAttempts.entries()) {
      lines.push(`gateway_auth_attempts_total{status="${escapeLabel(status)}"} ${value}`);
    }

    lines.push('# HELP gateway_auth_token_validations_total Total number of token validation results');
    lines.push('# TYPE gateway_auth_token_validations_total counter');
    for (const [status, value] of this.tokenValidations.entries()) {
      lines.push(`gateway_auth_token_validations_total{status="${escapeLabel(status)}"} ${value}`);
    }

    lines.push('# HELP gateway_auth_provider_operation_duration_seconds Duration of identity provider operations');
    lines.push('# TYPE gateway_auth_provider_operation_duration_seconds histogram');
    for (const [operation, hist] of this.providerDurations.entries()) {
      const lbl = `operation="${escapeLabel(operation)}"`;
      let cumulative = 0;
      for (let i = 0; i < DURATION_BUCKETS.length; i++) {
        cumulative += hist.buckets[i] ?? 0;
        lines.push(`gateway_auth_provider_operation_duration_seconds_bucket{${lbl},le="${DURATION_BUCKETS[i]}"} ${cumulative}`);
      }
      lines.push(`gateway_auth_provider_operation_duration_seconds_bucket{${lbl},le="+Inf"} ${hist.count}`);
      lines.push(`gateway_auth_provider_operation_duration_seconds_count{${lbl}} ${hist.count}`);
      lines.push(`gateway_auth_provider_operation_duration_seconds_sum{${lbl}} ${hist.sum}`);
    }

    return lines.join('\n') + '\n';
  }
}
