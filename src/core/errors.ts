export class DiscoveryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid entity or connection settings; raised while building, never later. */
export class ConfigurationError extends DiscoveryError {}

/** A state value was rejected before anything was published. */
export class ValidationError extends DiscoveryError {}

/** The entity was not set up to offer the requested feature. */
export class CapabilityError extends DiscoveryError {}

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
