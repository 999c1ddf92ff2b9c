/**
 * Capability gate: answers `unsupported` without reaching the solver when
 * the problem needs capabilities the solver does not advertise.
 */

import { type Clock, type Middleware, CapabilityDescriptor, immediateMeta, unsupported } from "@planwire/core";

export function createCapabilityGateMiddleware(deps: {
  solver: string;
  /** Read at invocation time */
  getCapabilities: () => CapabilityDescriptor;
  clock?: Clock;
}): Middleware {
  return (next) => async (invocation, signal) => {
    const advertised = deps.getCapabilities();
    const required = invocation.problem.kind;
    if (advertised.supports(required)) return next(invocation, signal);

    const missing = required.missingFrom(advertised);
    return unsupported({
      reason: `${deps.solver} does not support ${CapabilityDescriptor.fromRecord(missing).describe()}`,
      missing,
      meta: immediateMeta({ clock: deps.clock, solver: deps.solver }),
    });
  };
}
