export {
  createPaperAdapter,
  type PaperAdapter,
  type PaperAdapterConfig,
  type PaperBookUpdate,
} from "./adapter";
