export { DEFAULT_BUS_NAME, defineBusConfig } from "./define-config";
export type { BusConfig, DefineBusConfigInput, LoggerInput } from "./types";
