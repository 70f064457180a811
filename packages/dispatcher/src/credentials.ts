import type { ProviderSpec, ValidateCredential } from "./types.js";

/** Accepts every provider. Used when no validator is configured. */
export const alwaysValid: ValidateCredential = () => true;

/**
 * Treat `credentialRef` as an environment variable name and require it to
 * be set and non-empty. Specs without a `credentialRef` pass.
 */
export function envCredentialValidator(
  env: Readonly<Record<string, string | undefined>> = process.env,
): ValidateCredential {
  return (spec: ProviderSpec) => {
    if (spec.credentialRef === undefined) return true;
    const value = env[spec.credentialRef];
    return value !== undefined && value.length > 0;
  };
}
