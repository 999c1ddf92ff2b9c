export {
  createNatsSolveCore,
  natsConnector,
  isTimeoutError,
  isNoRespondersError,
  type RequestConnection,
  type Connector,
} from "./nats-transport.js";
export { describeEndpoint } from "./describe.js";
