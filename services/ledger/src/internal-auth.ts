import { createHash, createHmac, timingSafeEqual } from "node:crypto";

export const INTERNAL_TS_HEADER = "x-relayswap-internal-ts";
export const INTERNAL_SIG_HEADER = "x-relayswap-internal-sig";
export const INTERNAL_SERVICE_HEADER = "x-relayswap-internal-service";

export type InternalAuthRequest = {
  method: string;
  path: string;
  timestamp: string | undefined;
  signature: string | undefined;
  callerService: string | undefined;
  rawBody: string;
};

export type InternalAuthResult =
  | { ok: true; callerService: string; keyVersion: "current" | "previous" }
  | { ok: false; status: 401 | 403 | 409; error: string; reason: string };

export type InternalAuthOptions = {
  secret: string;
  previousSecret?: string;
  allowedServices: Set<string>;
  maxSkewMs: number;
  now?: () => number;
};

/** HMAC check for service-to-service calls, with clock skew bounds and a replay cache. */
export class InternalAuthVerifier {
  private readonly secret: string;
  private readonly secrets: string[];
  private readonly allowedServices: Set<string>;
  private readonly maxSkewMs: number;
  private readonly now: () => number;
  private readonly seenSignatures = new Map<string, number>();

  constructor(options: InternalAuthOptions) {
    this.secret = options.secret;
    this.secrets = Array.from(
      new Set([options.secret, options.previousSecret ?? ""].filter((secret) => secret.length > 0))
    );
    this.allowedServices = options.allowedServices;
    this.maxSkewMs = options.maxSkewMs;
    this.now = options.now ?? Date.now;
  }

  verify(request: InternalAuthRequest): InternalAuthResult {
    const { timestamp, signature } = request;
    const callerService = request.callerService?.trim();
    if (!timestamp || !signature || !callerService) {
      return { ok: false, status: 401, error: "missing_internal_auth_headers", reason: "missing_headers" };
    }
    if (this.allowedServices.size > 0 && !this.allowedServices.has(callerService)) {
      return { ok: false, status: 403, error: "unauthorized_internal_service", reason: "unauthorized_service" };
    }

    const ts = Number(timestamp);
    if (!Number.isFinite(ts)) {
      return { ok: false, status: 401, error: "invalid_internal_auth_timestamp", reason: "bad_timestamp" };
    }
    const now = this.now();
    if (Math.abs(now - ts) > this.maxSkewMs) {
      return { ok: false, status: 401, error: "stale_internal_auth_timestamp", reason: "stale_timestamp" };
    }

    const cacheKey = `${timestamp}:${callerService}:${signature}`;
    this.purgeExpired(now);
    if (this.seenSignatures.has(cacheKey)) {
      return { ok: false, status: 409, error: "replayed_internal_request", reason: "replay" };
    }

    const matchedSecret = this.secrets.find((secret) => {
      const expected = computeInternalSignature(secret, request.method, request.path, timestamp, callerService, request.rawBody);
      return constantTimeHexEqual(signature, expected);
    });
    if (!matchedSecret) {
      return { ok: false, status: 401, error: "invalid_internal_auth_signature", reason: "bad_signature" };
    }

    this.seenSignatures.set(cacheKey, now + this.maxSkewMs);
    return { ok: true, callerService, keyVersion: matchedSecret === this.secret ? "current" : "previous" };
  }

  private purgeExpired(now: number) {
    for (const [key, expiresAt] of this.seenSignatures.entries()) {
      if (expiresAt <= now) this.seenSignatures.delete(key);
    }
  }
}

export function computeInternalSignature(
  secret: string,
  method: string,
  routePath: string,
  timestamp: string,
  callerService: string,
  rawBody: string
): string {
  const bodyHash = createHash("sha256").update(rawBody).digest("hex");
  const payload = `${method.toUpperCase()}\n${routePath}\n${timestamp}\n${callerService}\n${bodyHash}`;
  return createHmac("sha256", secret).update(payload).digest("hex");
}

/** Headers a calling service attaches to an internal request. */
export function signInternalRequest(input: {
  secret: string;
  callerService: string;
  method: string;
  routePath: string;
  rawBody: string;
  now?: number;
}): Record<string, string> {
  const timestamp = (input.now ?? Date.now()).toString();
  return {
    [INTERNAL_TS_HEADER]: timestamp,
    [INTERNAL_SIG_HEADER]: computeInternalSignature(
      input.secret,
      input.method,
      input.routePath,
      timestamp,
      input.callerService,
      input.rawBody
    ),
    [INTERNAL_SERVICE_HEADER]: input.callerService
  };
}

export function constantTimeHexEqual(a: string, b: string): boolean {
  if (!/^[0-9a-fA-F]+$/.test(a) || !/^[0-9a-fA-F]+$/.test(b)) return false;
  const lhs = Buffer.from(a, "hex");
  const rhs = Buffer.from(b, "hex");
  if (lhs.length === 0 || lhs.length !== rhs.length) return false;
  return timingSafeEqual(lhs, rhs);
}

export function normalizeIp(value: string): string {
  let normalized = value.trim();
  if (normalized.startsWith("::ffff:")) {
    normalized = normalized.slice("::ffff:".length);
  }
  const zoneIndex = normalized.indexOf("%");
  if (zoneIndex >= 0) {
    normalized = normalized.slice(0, zoneIndex);
  }
  return normalized;
}

export function isPrivateIp(ip: string): boolean {
  if (ip === "::1") return true;
  if (ip.startsWith("fc") || ip.startsWith("fd") || ip.startsWith("fe80:")) return true;

  const parts = ip.split(".");
  if (parts.length !== 4) return false;
  const octets = parts.map((part) => Number(part));
  if (octets.some((octet) => !Number.isInteger(octet) || octet < 0 || octet > 255)) return false;

  const a = octets[0] ?? -1;
  const b = octets[1] ?? -1;
  if (a === 10 || a === 127) return true;
  if (a === 192 && b === 168) return true;
  if (a === 172 && b >= 16 && b <= 31) return true;
  if (a === 169 && b === 254) return true;
  return false;
}

export type NetworkPolicy = {
  allowedIps: Set<string>;
  requirePrivateIp: boolean;
};

/** Returns the rejection reason, or undefined when the address may call internal routes. */
export function internalNetworkRejection(clientIp: string | null, policy: NetworkPolicy): string | undefined {
  if (!clientIp) return "missing_ip";
  if (policy.allowedIps.size > 0) {
    return policy.allowedIps.has(clientIp) ? undefined : "ip_not_allowlisted";
  }
  if (policy.requirePrivateIp && !isPrivateIp(clientIp)) return "ip_not_private";
  return undefined;
}
