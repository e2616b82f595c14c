/**
 * Raised when a collaborator breaks its contract, e.g. the login API rejects
 * instead of resolving to a typed result. Never mapped into a login failure.
 */
export class LoginContractError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "LoginContractError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
