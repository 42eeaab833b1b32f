export { GATEIO_VENUE, createGateioAdapter, type GateioAdapterConfig } from "./adapter";
export { GATEIO_RATE_LIMITS } from "./rate-limits";
export { toGateioPair } from "./normalizers";
