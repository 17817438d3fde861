/**
 * API key resolution.
 *
 * Resolvers are queried in order and the first non-empty value wins. The
 * environment comes first, so a key-value file only ever provides a default
 * and never overrides a variable that is already set.
 */

import { existsSync, readFileSync } from "node:fs";
import { parse } from "dotenv";
import { API_KEY_VARIABLE } from "./extractionConfig";
import { CredentialMissingError } from "../utils/errors";

export interface CredentialResolver {
  /** Where the value comes from, for diagnostics ("env:GEMINI_API_KEY") */
  source: string;
  resolve: () => string | null;
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function envCredentialResolver(
  variable: string = API_KEY_VARIABLE,
  env: Record<string, string | undefined> = process.env
): CredentialResolver {
  return {
    source: `env:${variable}`,
    resolve: () => nonEmpty(env[variable]),
  };
}

export function dotenvFileCredentialResolver(
  filePath: string,
  variable: string = API_KEY_VARIABLE
): CredentialResolver {
  return {
    source: `file:${filePath}`,
    resolve: () => {
      if (!existsSync(filePath)) return null;
      const values = parse(readFileSync(filePath, "utf8"));
      return nonEmpty(values[variable]);
    },
  };
}

export function defaultCredentialResolvers(
  credentialsFile: string,
  env: Record<string, string | undefined> = process.env
): CredentialResolver[] {
  return [
    envCredentialResolver(API_KEY_VARIABLE, env),
    dotenvFileCredentialResolver(credentialsFile, API_KEY_VARIABLE),
  ];
}

export function resolveCredential(
  resolvers: CredentialResolver[],
  variable: string = API_KEY_VARIABLE
): string {
  for (const resolver of resolvers) {
    const value = resolver.resolve();
    if (value) {
      console.error(`[Credentials] Using ${variable} from ${resolver.source}`);
      return value;
    }
  }
  throw new CredentialMissingError(
    variable,
    resolvers.map((r) => r.source)
  );
}
