import { ConfigurationError } from "../../shared/errors.js";
import { BASE_PATH_VAR, TRELLO_API_KEY_VAR, TRELLO_API_TOKEN_VAR } from "../../shared/config/schema.js";

export interface CredentialProvider {
  /** Returns the trimmed value of `name`, or throws ConfigurationError when it is missing or blank. */
  resolve(name: string): string;
}

export type TrelloCredentials = Readonly<{ key: string; token: string }>;

type EnvSource = Record<string, string | undefined>;

function requireValue(name: string, value: string | undefined): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new ConfigurationError(`Missing required environment variable: ${name}`);
  }
  return trimmed;
}

/** Reads the environment on every call so rotated credentials apply to the next request. */
export class EnvCredentialProvider implements CredentialProvider {
  constructor(private readonly env: EnvSource = process.env) {}

  resolve(name: string): string {
    return requireValue(name, this.env[name]);
  }
}

export class StaticCredentialProvider implements CredentialProvider {
  private readonly values: ReadonlyMap<string, string>;

  constructor(values: Record<string, string>) {
    this.values = new Map(Object.entries(values));
  }

  resolve(name: string): string {
    return requireValue(name, this.values.get(name));
  }
}

export function resolveTrelloCredentials(provider: CredentialProvider): TrelloCredentials {
  return Object.freeze({
    key: provider.resolve(TRELLO_API_KEY_VAR),
    token: provider.resolve(TRELLO_API_TOKEN_VAR)
  });
}

export function resolveBasePath(provider: CredentialProvider): string {
  return provider.resolve(BASE_PATH_VAR);
}
