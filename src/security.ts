import { createHmac, randomUUID, timingSafeEqual } from "node:crypto";

export type AuthReasonCode = "AUTH_MISSING" | "AUTH_INVALID";

export interface AuthContext {
  headers: Record<string, string | undefined>;
}

export type AuthResult = { ok: true } | { ok: false; reason: AuthReasonCode };

export class AuthService {
  constructor(
    private readonly options: {
      mode: "token" | "none";
      token?: string;
    }
  ) {}

  authorize(context: AuthContext): AuthResult {
    if (this.options.mode === "none") {
      return { ok: true };
    }
    const headerToken = context.headers.authorization?.replace(/^Bearer\s+/i, "");
    if (!headerToken) {
      return { ok: false, reason: "AUTH_MISSING" };
    }
    if (this.options.token === undefined || !constantTimeEquals(headerToken, this.options.token)) {
      return { ok: false, reason: "AUTH_INVALID" };
    }
    return { ok: true };
  }
}

export function createAuditId(prefix = "audit"): string {
  return `${prefix}_${randomUUID()}`;
}

export class MethodRateLimiter {
  private readonly events = new Map<string, number[]>();
  private lastSweep = 0;

  constructor(
    private readonly defaultLimit: number,
    private readonly windowMs: number,
    private readonly methodLimits: Record<string, number> = {}
  ) {}

  /** Method and subject pairs with requests inside the current window. */
  get trackedKeys(): number {
    return this.events.size;
  }

  allow(method: string, subject: string, now = Date.now()): boolean {
    const key = `${method}:${subject}`;
    const floor = now - this.windowMs;
    if (now - this.lastSweep >= this.windowMs) {
      this.sweep(floor);
      this.lastSweep = now;
    }
    const history = this.events.get(key) ?? [];
    const filtered = history.filter((timestamp) => timestamp >= floor);
    const limit = this.methodLimits[method] ?? this.defaultLimit;
    if (filtered.length >= limit) {
      this.events.set(key, filtered);
      return false;
    }
    filtered.push(now);
    this.events.set(key, filtered);
    return true;
  }

  private sweep(floor: number): void {
    for (const [key, history] of this.events) {
      if (history.every((timestamp) => timestamp < floor)) {
        this.events.delete(key);
      }
    }
  }
}

/** Requests older than this are rejected to block replays. */
export const SLACK_SIGNATURE_MAX_AGE_SECONDS = 5 * 60;

export function signSlackRequest(signingSecret: string, timestamp: string, rawBody: string): string {
  const digest = createHmac("sha256", signingSecret).update(`v0:${timestamp}:${rawBody}`).digest("hex");
  return `v0=${digest}`;
}

/** Checks Slack's `x-slack-signature` / `x-slack-request-timestamp` pair. */
export function verifySlackSignature(args: {
  signingSecret: string;
  timestamp: string | undefined;
  signature: string | undefined;
  rawBody: string;
  nowSeconds?: number;
}): boolean {
  const { timestamp, signature } = args;
  if (!timestamp || !signature || !/^\d+$/.test(timestamp)) {
    return false;
  }
  const now = args.nowSeconds ?? Math.floor(Date.now() / 1000);
  if (Math.abs(now - Number.parseInt(timestamp, 10)) > SLACK_SIGNATURE_MAX_AGE_SECONDS) {
    return false;
  }
  return constantTimeEquals(signature, signSlackRequest(args.signingSecret, timestamp, args.rawBody));
}

function constantTimeEquals(lhs: string, rhs: string): boolean {
  const a = Buffer.from(lhs, "utf8");
  const b = Buffer.from(rhs, "utf8");
  return a.length === b.length && timingSafeEqual(a, b);
}
