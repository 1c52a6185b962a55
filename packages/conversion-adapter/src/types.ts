export type ConvertArgs = {
  installationId: string;
  requestId: string;
};

export type ConversionResult = {
  confirmationId: string;
};

export type ConversionProvider = {
  convert: (args: ConvertArgs) => Promise<ConversionResult>;
};

/** Reads an installation identifier off a screenshot. Implemented upstream of the ledger. */
export type OpticalExtractor = {
  extract: (image: Uint8Array) => Promise<{ installationId: string }>;
};

export type CreateHttpConversionAdapterArgs = {
  endpoint: string;
  apiKey: string;
  timeoutMs?: number;
  fetchFn?: typeof fetch;
};
