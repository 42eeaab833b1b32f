export { BYBIT_VENUE, createBybitAdapter, type BybitAdapterConfig } from "./adapter";
export { BYBIT_RATE_LIMITS } from "./rate-limits";
export { toBybitSymbol } from "./normalizers";
