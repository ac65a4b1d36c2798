export class DuplicateRegistrationError extends Error {
  constructor(readonly discriminator: string) {
    super(`Handler already registered for ${discriminator}`);
    this.name = 'DuplicateRegistrationError';
  }
}

export class RegistryLockedError extends Error {
  constructor(readonly discriminator: string) {
    super(
      `Handler registry is locked. Cannot register ${discriminator} after startup; ` +
      'all handlers must be registered before the dispatcher runs.'
    );
    this.name = 'RegistryLockedError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

/** The model called a tool this process neither handles nor declares as external. */
export class UnhandledToolError extends Error {
  constructor(readonly toolName: string, readonly invocationId: string) {
    super(`No handler for tool ${toolName} (invocation ${invocationId})`);
    this.name = 'UnhandledToolError';
  }
}

export class ControlScriptError extends Error {
  constructor(readonly profile: string, message: string) {
    super(`Control script ${profile}: ${message}`);
    this.name = 'ControlScriptError';
  }
}

export class BudgetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BudgetError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
