export { ConversionProviderUnavailableError, type ConversionUnavailableReason } from "./conversion-client";
export { DEFAULT_CONVERSION_TIMEOUT_MS, createHttpConversionAdapter } from "./http-adapter";
export {
  INSTALLATION_ID_DIGITS,
  InvalidInstallationIdError,
  formatInstallationId,
  maskInstallationId,
  normalizeInstallationId,
  type InvalidInstallationIdReason,
} from "./installation-id";
export { createConversionProvider, type ConversionAdapterMode } from "./provider";
export {
  createConversionSimulationAdapter,
  type ConversionSimulationScenario,
  type CreateConversionSimulationAdapterArgs,
} from "./simulation-adapter";
export type {
  ConversionProvider,
  ConversionResult,
  ConvertArgs,
  CreateHttpConversionAdapterArgs,
  OpticalExtractor,
} from "./types";
