import type { Logger } from 'pino';
import defaultLogger from '../logger.js';
import {
  noopAuthMetrics,
  recordSafely,
  type AuthMetrics,
  type TokenValidationStatus,
} from '../metrics/prometheus.js';
import { AuthenticationError, classifyAuthError, errorMessage, type AuthFailureKind } from './errors.js';
import type { IdentityProviderClient } from './keycloak.js';
import type { RawClaims } from './principal.js';

export type ValidationResult =
  | { ok: true; claims: RawClaims }
  | { ok: false; kind: AuthFailureKind; detail: string };

const validationStatusByKind: Record<AuthFailureKind, TokenValidationStatus> = {
  expired: 'expired',
  invalid_credentials: 'invalid',
  decode_error: 'error',
};

export interface TokenValidatorOptions {
  metrics?: AuthMetrics;
  logger?: Logger;
}

/**
 * Wraps the identity provider's token decoding. Exactly one provider call per
 * validation; failures are classified, never retried.
 */
export class TokenValidator {
  private readonly metrics: AuthMetrics;
  private readonly log: Logger;

  constructor(
    private readonly provider: IdentityProviderClient,
    options: TokenValidatorOptions = {},
  ) {
    this.metrics = options.metrics ?? noopAuthMetrics;
    this.log = options.logger ?? defaultLogger.child({ component: 'TokenValidator' });
  }

  async validate(token: string): Promise<ValidationResult> {
    const startedAt = performance.now();
    let result: ValidationResult;
    try {
      const claims = await this.provider.decodeToken(token);
      result = { ok: true, claims };
    } catch (error) {
      const detail = error instanceof AuthenticationError ? error.detail : errorMessage(error);
      // Anything the provider client did not classify is a rejection.
      result = { ok: false, kind: classifyAuthError(error) ?? 'invalid_credentials', detail };
    }

    const seconds = (performance.now() - startedAt) / 1000;
    const status: TokenValidationStatus = result.ok ? 'valid' : validationStatusByKind[result.kind];
    recordSafely(this.log, () => this.metrics.recordProviderDuration('validate_token', seconds));
    recordSafely(this.log, () => this.metrics.recordTokenValidation(status));
    return result;
  }
}
