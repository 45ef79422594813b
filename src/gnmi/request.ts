import type { GnmiPath } from "./path.js";

export type SubscriptionMode = "TARGET_DEFINED" | "ON_CHANGE" | "SAMPLE";

export interface Subscription {
  path: GnmiPath;
  mode: SubscriptionMode;
}

export interface SubscribeRequest {
  subscribe: {
    prefix: { target: string };
    subscription: Subscription[];
  };
}

export type AuthMetadata = Record<"username" | "password", string>;

/**
 * One subscription per path, in the order given. The target picks the
 * sampling cadence for each (TARGET_DEFINED).
 */
export function buildSubscribeRequest(targetValue: string, paths: readonly GnmiPath[]): SubscribeRequest {
  return {
    subscribe: {
      prefix: { target: targetValue },
      subscription: paths.map((path) => ({ path, mode: "TARGET_DEFINED" })),
    },
  };
}

/** Credentials only travel when a username is set; the password may be empty. */
export function authMetadata(username?: string, password?: string): AuthMetadata | undefined {
  if (!username) return undefined;
  return { username, password: password ?? "" };
}
