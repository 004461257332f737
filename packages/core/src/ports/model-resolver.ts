export interface ResolvedModel {
  readonly engine: string;
  readonly reference: string;
  readonly resolved: string;
  readonly engineVersion?: string;
}

/**
 * Owns whatever global model state the engine keeps (installed models,
 * downloaded language data). Rejects with ConfigurationError.
 */
export interface ModelResolverPort {
  resolve(reference: string): Promise<ResolvedModel>;
}
