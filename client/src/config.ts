/**
 * Planning client configuration.
 */

import { DEFAULT_SUBJECT_PREFIX } from "@planwire/core";

export interface PlanningClientConfig {
  /** Default endpoint for discover(), host:port */
  address: string;
  subjectPrefix: string;
  /** NATS connection name used by discovery */
  connectionName: string;
  /** Bound on describe round trips */
  describeTimeoutMs: number;
  /** Applied to solve() calls that give no timeout; none when unset */
  solveTimeoutMs?: number;
}

export const defaultPlanningClientConfig: PlanningClientConfig = {
  address: "127.0.0.1:4222",
  subjectPrefix: DEFAULT_SUBJECT_PREFIX,
  connectionName: "planwire-client",
  describeTimeoutMs: 10_000,
};
