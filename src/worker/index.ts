export * from "./execution";
export * from "./freshness";
export * from "./order-book";
export * from "./queue";
export * from "./session";
export { startWorker, type StartWorkerConfig, type WorkerHandle } from "./start-worker";
