import { z } from 'zod';

/** Decoded token payload as returned by the identity provider. */
export type RawClaims = Record<string, unknown>;

const TokenClaimsSchema = z
  .object({
    sub: z.string().min(1),
    exp: z.number().int(),
    preferred_username: z.string(),
    azp: z.string().optional(),
  })
  .passthrough();

export interface Principal {
  /** Subject identifier (`sub`). */
  readonly id: string;
  readonly username: string;
  /** Token expiry, Unix seconds. */
  readonly expiresAt: number;
  /** Client roles granted to the authorized party (`azp`). */
  readonly roles: readonly string[];
}

export type PrincipalParseResult =
  | { ok: true; principal: Principal }
  | { ok: false; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function lookup(node: unknown, key: string): unknown {
  return isRecord(node) && Object.prototype.hasOwnProperty.call(node, key) ? node[key] : undefined;
}

/**
 * `resource_access[azp].roles`, with every missing or wrong-shaped step
 * resolving to an empty list. Non-string entries are dropped and duplicates
 * collapse onto their first occurrence.
 */
export function extractRoles(claims: RawClaims): string[] {
  const azp = typeof claims.azp === 'string' ? claims.azp : '';
  const roles = lookup(lookup(claims.resource_access, azp), 'roles');
  if (!Array.isArray(roles)) {
    return [];
  }
  const unique = new Set<string>();
  for (const role of roles) {
    if (typeof role === 'string') {
      unique.add(role);
    }
  }
  return [...unique];
}

export function parsePrincipal(claims: RawClaims): PrincipalParseResult {
  const parsed = TokenClaimsSchema.safeParse(claims);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)');
    return { ok: false, reason: `Token claims missing or malformed: ${[...new Set(fields)].join(', ')}` };
  }

  const principal: Principal = Object.freeze({
    id: parsed.data.sub,
    username: parsed.data.preferred_username,
    expiresAt: parsed.data.exp,
    roles: Object.freeze(extractRoles(claims)),
  });
  return { ok: true, principal };
}

/** Seconds until the token expires; negative once it has. */
export function secondsUntilExpiry(principal: Principal, nowMs: number = Date.now()): number {
  return principal.expiresAt - Math.floor(nowMs / 1000);
}

/** Principals are the same user when their subject ids match, whatever their roles. */
export function isSamePrincipal(a: Principal, b: Principal): boolean {
  return a.id === b.id;
}
