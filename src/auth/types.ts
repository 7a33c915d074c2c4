import type { Request } from 'express';

export interface Principal {
  username: string;
  active: boolean;
}

export type Credential =
  | { kind: 'api_key'; key: string }
  | { kind: 'password'; username: string; password: string }
  | { kind: 'bearer'; token: string };

export type AuthScheme = 'api_key' | 'bearer';

// One credential-extraction strategy. Implementations are built once at startup
// and shared read-only across requests.
export interface Authenticator {
  readonly scheme: AuthScheme;
  // Returns undefined when the request carries no credential for this scheme
  extractCredential(req: Request): Credential | undefined;
  // Throws InvalidCredentialError when the credential does not map to an active principal
  resolve(credential: Credential): Promise<Principal>;
  // Thrown by the gate when extractCredential finds nothing
  missingCredential(): Error;
}

export type AuthenticatedRequest = Request & { principal?: Principal };
