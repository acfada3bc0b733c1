/**
 * Session values derived from the identity token and the subscription.
 */
import { z } from "zod";
import { type LegacyClaims, LegacyClaimsSchema, type Subscription } from "./schemas.js";

/**
 * Query values every stream request carries.
 */
export interface StreamParams {
  subscriptionId: string;
  /** Plan id granting access; the promo plan's id for promotional subscriptions. */
  planId: string;
  userId: string;
  /** Unix seconds, as strings. */
  startStamp: string;
  endStamp: string;
}

/**
 * Session state shared by every request after sign-in.
 */
export interface Session {
  /** Bearer token for the identity and subscription APIs. */
  accessToken: string;
  legacyToken: string;
  legacyUguid: string;
  streamParams: StreamParams;
  planDescription: string;
}

export class SessionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "SessionError";
  }
}

/**
 * Reads the legacy credentials from the payload segment of a JWT.
 *
 * @example
 * extractLegacyToken(accessToken)
 * // => { legacyToken: "...", legacyUguid: "..." }
 */
export function extractLegacyToken(jwt: string): LegacyClaims {
  const payload = jwt.split(".")[1];
  if (!payload || !/^[A-Za-z0-9_-]+={0,2}$/.test(payload)) {
    throw new SessionError("Access token is not a JWT");
  }

  let claims: unknown;
  try {
    claims = JSON.parse(Buffer.from(payload, "base64url").toString("utf-8"));
  } catch (error) {
    throw new SessionError("Access token payload is not JSON", { cause: error });
  }

  const result = LegacyClaimsSchema.safeParse(claims);
  if (!result.success) {
    throw new SessionError(`Access token lacks legacy claims:\n${z.prettifyError(result.error)}`);
  }
  return result.data;
}

const TIMESTAMP_PATTERN = /^(\d{2})\/(\d{2})\/(\d{4}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Converts a `MM/DD/YYYY HH:mm:ss` UTC timestamp to unix seconds.
 * An empty value stays empty.
 */
export function parseTimestamp(value: string): string {
  if (value === "") return "";

  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    throw new SessionError(`Unrecognised subscription date: ${value}`);
  }

  const [month = 1, day = 1, year = 1970, hours = 0, minutes = 0, seconds = 0] = match
    .slice(1)
    .map(Number);
  const millis = Date.UTC(year, month - 1, day, hours, minutes, seconds);
  return String(Math.floor(millis / 1000));
}

export interface PlanInfo {
  description: string;
  isPromo: boolean;
}

/**
 * A subscription without a regular plan runs on its promo plan.
 */
export function getPlanDescription(subscription: Subscription): PlanInfo {
  const { plan, promo } = subscription;
  if (plan.description !== "" || plan.planId !== "") {
    return { description: plan.description, isPromo: false };
  }
  return { description: promo.plan.description, isPromo: true };
}

export function buildStreamParams(
  userId: string,
  subscription: Subscription,
  isPromo: boolean
): StreamParams {
  return {
    subscriptionId: subscription.legacySubscriptionId,
    planId: isPromo ? subscription.promo.plan.planId : subscription.plan.planId,
    userId,
    startStamp: parseTimestamp(subscription.startedAt),
    endStamp: parseTimestamp(subscription.endsAt),
  };
}
