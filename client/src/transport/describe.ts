import {
  type SolverInfo,
  DEFAULT_SUBJECT_PREFIX,
  DescribeResponseSchema,
  TransportError,
  decodeMessage,
  describeSubject,
  errorMessage,
} from "@planwire/core";
import { type RequestConnection, isNoRespondersError, isTimeoutError } from "./nats-transport.js";

const SERVICE_NAME = "planwire-client:describe";

/**
 * Ask an endpoint which solvers it hosts.
 *
 * @throws TransportError when the endpoint does not answer or answers garbage
 */
export async function describeEndpoint(params: {
  connection: RequestConnection;
  address: string;
  subjectPrefix?: string;
  timeoutMs: number;
}): Promise<SolverInfo[]> {
  const subject = describeSubject(params.subjectPrefix ?? DEFAULT_SUBJECT_PREFIX);
  let data: Uint8Array;
  try {
    const reply = await params.connection.request(subject, new Uint8Array(0), { timeout: params.timeoutMs });
    data = reply.data;
  } catch (err) {
    const reason = isTimeoutError(err)
      ? `no answer within ${params.timeoutMs}ms`
      : isNoRespondersError(err)
        ? "no endpoint is listening"
        : errorMessage(err);
    throw new TransportError({
      message: `${SERVICE_NAME}:describe - Cannot describe ${params.address}: ${reason}`,
      retryable: true,
      details: { address: params.address, subject },
      cause: err,
    });
  }

  let decoded: unknown;
  try {
    decoded = decodeMessage(data);
  } catch (err) {
    throw new TransportError({
      message: `${SERVICE_NAME}:describe - Describe response from ${params.address} is not valid JSON`,
      details: { address: params.address, error: errorMessage(err) },
    });
  }
  const parsed = DescribeResponseSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new TransportError({
      message: `${SERVICE_NAME}:describe - Malformed describe response from ${params.address}`,
      details: { address: params.address, errors: parsed.error.flatten() },
    });
  }
  return parsed.data.solvers;
}
