/**
 * Remote solver: a solver hosted by a planwire endpoint, reached over NATS.
 *
 * Each instance owns its connection, opened in start() and drained in
 * destroy(). Capabilities come from the endpoint's describe answer, so the
 * capability gate answers `unsupported` locally without a round trip.
 */

import { z } from "zod";
import {
  type SolveHandler,
  type SolveInvocation,
  type SolveOutcome,
  type SolverInfo,
  CapabilityDescriptor,
  ContractViolationError,
  DEFAULT_SUBJECT_PREFIX,
  TransportError,
  errorMessage,
  toNatsUrl,
} from "@planwire/core";
import { AbstractSolver, type SolverContext, type SolverDefinition } from "../solver.js";
import { type Connector, type RequestConnection, createNatsSolveCore, natsConnector } from "../transport/nats-transport.js";

const LOG_PREFIX = "planwire-client:remote";

export const RemoteOptionsSchema = z
  .object({
    timeoutMs: z.number().int().positive().optional(),
    connectionName: z.string().min(1).optional(),
  })
  .strict();

export type RemoteOptions = z.infer<typeof RemoteOptionsSchema>;

export interface RemoteSolverConfig {
  info: SolverInfo;
  /** host:port of the endpoint */
  address: string;
  subjectPrefix?: string;
  /** Registered name; defaults to `info.name` */
  alias?: string;
  connect?: Connector;
}

export function defineRemoteSolver(config: RemoteSolverConfig): SolverDefinition<RemoteOptions> {
  const definition: SolverDefinition<RemoteOptions> = {
    name: config.alias ?? config.info.name,
    description: `${config.info.name} at ${config.address}`,
    roles: { ...config.info.roles },
    capabilities: CapabilityDescriptor.fromRecord(config.info.capabilities),
    optionsSchema: RemoteOptionsSchema,
    create: (options, context) => new RemoteSolver({ definition, options, context, config }),
  };
  return definition;
}

class RemoteSolver extends AbstractSolver<RemoteOptions> {
  private readonly config: RemoteSolverConfig;
  private connection?: RequestConnection;
  private core?: SolveHandler;

  constructor(params: {
    definition: SolverDefinition<RemoteOptions>;
    options: RemoteOptions;
    context: SolverContext;
    config: RemoteSolverConfig;
  }) {
    super(params);
    this.config = params.config;
  }

  protected override defaultTimeoutMs(): number | undefined {
    return this.options.timeoutMs;
  }

  protected override async open(): Promise<void> {
    const connect = this.config.connect ?? natsConnector;
    const servers = toNatsUrl(this.config.address);
    try {
      this.connection = await connect({
        servers,
        name: this.options.connectionName ?? `planwire-client:${this.name()}`,
      });
    } catch (err) {
      throw new TransportError({
        message: `${LOG_PREFIX}:open - Cannot connect to ${this.config.address}: ${errorMessage(err)}`,
        retryable: true,
        details: { address: this.config.address, servers },
        cause: err,
      });
    }
    this.core = createNatsSolveCore({
      connection: this.connection,
      address: this.config.address,
      subjectPrefix: this.config.subjectPrefix ?? DEFAULT_SUBJECT_PREFIX,
      solver: this.config.info.name,
      clock: this.clock,
    });
    this.log.info?.({ address: this.config.address, servers }, `${LOG_PREFIX}:open - Connected`);
  }

  protected async execute(invocation: SolveInvocation, signal: AbortSignal): Promise<SolveOutcome> {
    if (!this.core) {
      throw new ContractViolationError({ message: `${LOG_PREFIX}:execute - Solver "${this.name()}" is not connected` });
    }
    return this.core(invocation, signal);
  }

  protected override async release(): Promise<void> {
    const connection = this.connection;
    this.connection = undefined;
    this.core = undefined;
    if (!connection) return;
    try {
      await connection.drain();
    } catch (err) {
      this.log.warn?.(
        { address: this.config.address, error: errorMessage(err) },
        `${LOG_PREFIX}:release - Error draining connection`
      );
    }
  }
}
