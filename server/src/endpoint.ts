/**
 * Solver endpoint: connects to the address, subscribes to the solve and
 * describe subjects, and answers each request with the hosted solvers.
 *
 * `concurrentWorkers` subscriptions per subject join one queue group so each
 * message is delivered to exactly one worker. Each worker handles its
 * messages one at a time, so a single worker answers in submission order.
 */

import { connect } from "nats";
import {
  type Clock,
  type Logger,
  type Problem,
  describeSubject,
  encodeMessage,
  errorMessage,
  failed,
  immediateMeta,
  resolveLogger,
  solveSubject,
  toNatsUrl,
} from "@planwire/core";
import type { ServerConfig } from "./config.js";
import { handleDescribeMessage, handleSolveMessage } from "./handler.js";
import type { SolverHost } from "./solver-host.js";

const LOG_PREFIX = "planwire-server:endpoint";

// ── Connections ─────────────────────────────────────────────────────

/** The parts of a NATS message a worker uses. */
export interface EndpointMessage {
  data: Uint8Array;
  reply?: string;
  respond(data?: Uint8Array): boolean;
}

export interface EndpointSubscription extends AsyncIterable<EndpointMessage> {
  drain(): Promise<void>;
}

export interface EndpointConnection {
  subscribe(subject: string, opts?: { queue?: string }): EndpointSubscription;
  drain(): Promise<void>;
}

export type EndpointConnector = (opts: { servers: string; name: string }) => Promise<EndpointConnection>;

export const natsEndpointConnector: EndpointConnector = (opts) => connect(opts);

// ── Endpoint ────────────────────────────────────────────────────────

export interface SolverEndpointParams {
  config: Pick<ServerConfig, "address" | "connectionName" | "subjectPrefix" | "concurrentWorkers">;
  host: SolverHost;
  connect?: EndpointConnector;
  loadProblem?: (locator: string) => Promise<Problem>;
  loggerFactory?: Logger;
  clock?: Clock;
}

export class SolverEndpoint {
  private readonly config: SolverEndpointParams["config"];
  private readonly host: SolverHost;
  private readonly connect: EndpointConnector;
  private readonly loadProblem?: (locator: string) => Promise<Problem>;
  private readonly log: Logger;
  private readonly clock?: Clock;
  private connection: EndpointConnection | null = null;
  private subscriptions: EndpointSubscription[] = [];
  private workers: Promise<void>[] = [];

  constructor(params: SolverEndpointParams) {
    this.config = params.config;
    this.host = params.host;
    this.connect = params.connect ?? natsEndpointConnector;
    this.loadProblem = params.loadProblem;
    this.log = resolveLogger(params.loggerFactory, LOG_PREFIX);
    this.clock = params.clock;
  }

  /**
   * Start the hosted solvers, connect and subscribe.
   */
  async start(): Promise<void> {
    if (this.connection) return;
    const servers = toNatsUrl(this.config.address);
    await this.host.start();

    this.log.info?.(
      { address: this.config.address, servers, connectionName: this.config.connectionName },
      `${LOG_PREFIX}:start - Connecting`
    );
    try {
      this.connection = await this.connect({ servers, name: this.config.connectionName });
    } catch (err) {
      await this.host.stop();
      throw err;
    }

    const queue = `${this.config.subjectPrefix}.endpoint`;
    const solve = solveSubject(this.config.subjectPrefix);
    const describe = describeSubject(this.config.subjectPrefix);

    for (let w = 0; w < this.config.concurrentWorkers; w++) {
      const sub = this.connection.subscribe(solve, { queue });
      this.subscriptions.push(sub);
      this.workers.push(this.runSolveWorker(sub, w));
    }
    const describeSub = this.connection.subscribe(describe, { queue });
    this.subscriptions.push(describeSub);
    this.workers.push(this.runDescribeWorker(describeSub));

    this.log.info?.(
      { solve, describe, queue, concurrentWorkers: this.config.concurrentWorkers },
      `${LOG_PREFIX}:start - Listening`
    );
  }

  /**
   * Drain subscriptions, let in-flight requests finish, close the
   * connection and destroy the hosted solvers.
   */
  async stop(): Promise<void> {
    this.log.info?.({}, `${LOG_PREFIX}:stop - Stopping`);
    for (const sub of this.subscriptions) {
      await sub.drain();
    }
    this.subscriptions = [];
    await Promise.all(this.workers);
    this.workers = [];
    if (this.connection) {
      await this.connection.drain();
      this.connection = null;
    }
    await this.host.stop();
    this.log.info?.({}, `${LOG_PREFIX}:stop - Stopped`);
  }

  /**
   * A single worker loop: consume messages in order, handle, reply.
   */
  private async runSolveWorker(sub: EndpointSubscription, worker: number): Promise<void> {
    try {
      for await (const msg of sub) {
        let reply: Uint8Array;
        try {
          const response = await handleSolveMessage({
            body: msg.data,
            host: this.host,
            loadProblem: this.loadProblem,
            log: this.log,
            clock: this.clock,
          });
          reply = encodeMessage(response);
        } catch (err) {
          this.log.error?.({ worker, error: errorMessage(err) }, `${LOG_PREFIX}:runSolveWorker - Handle failed`);
          reply = encodeMessage({
            id: "",
            outcome: failed({
              code: "INTERNAL_ERROR",
              message: errorMessage(err),
              meta: immediateMeta({ clock: this.clock }),
            }),
          });
        }
        if (msg.reply) msg.respond(reply);
      }
    } catch (err) {
      this.log.error?.({ worker, error: errorMessage(err) }, `${LOG_PREFIX}:runSolveWorker - Worker loop error`);
    }
  }

  private async runDescribeWorker(sub: EndpointSubscription): Promise<void> {
    try {
      for await (const msg of sub) {
        if (msg.reply) msg.respond(encodeMessage(handleDescribeMessage({ host: this.host })));
      }
    } catch (err) {
      this.log.error?.({ error: errorMessage(err) }, `${LOG_PREFIX}:runDescribeWorker - Worker loop error`);
    }
  }
}
