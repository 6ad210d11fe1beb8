/**
 * Wire shapes exchanged with the auth endpoints. These mirror the JSON the
 * API sends and are never handed to callers directly; see the mapping
 * functions in auth/mappers.ts.
 */

export interface ApiEnvelope {
  Code: number;
  Error?: string;
}

export interface AuthInfoRequest {
  ClientID: string;
  ClientSecret: string;
  Username: string;
}

export interface AuthInfoResponse extends ApiEnvelope {
  Version: number;
  Modulus: string;           // Base64-encoded, PGP-signed
  ServerEphemeral: string;   // Base64-encoded
  Salt: string;              // Base64-encoded
  SRPSession: string;        // Session ID for this auth attempt
  TwoFactor?: number;        // 1 when a second factor will be asked for
  Username?: string;         // Username returned by server (for old auth versions)
}

export interface AuthRequest {
  ClientID: string;
  ClientSecret: string;
  Username: string;
  SRPSession: string;
  ClientEphemeral: string;
  ClientProof: string;
  TwoFactorCode: string;
}

export interface AuthResponse extends ApiEnvelope {
  AccessToken: string;
  TokenType?: string;
  ExpiresIn?: number;
  Scope?: string;
  Uid: string;
  RefreshToken: string;
  EventID?: string;
  PasswordMode: number;      // 1 = single password, 2 = two password
  ServerProof: string;       // For verification
  PrivateKey: string;        // Armored, encrypted
  KeySalt?: string;          // Base64-encoded
}

export interface RefreshRequest {
  ClientID: string;
  UID: string;
  RefreshToken: string;
  ResponseType: 'token';
  GrantType: 'refresh_token';
  RedirectURI: string;
  State: string;
}

export interface RefreshResponse extends ApiEnvelope {
  AccessToken: string;
  TokenType?: string;
  ExpiresIn?: number;
  Scope?: string;
  Uid?: string;
  RefreshToken: string;
}

// ─── Domain values ──────────────────────────────────────────────────

export enum PasswordMode {
  Single = 1,
  Two = 2,
}

/**
 * SRP parameters for one authentication attempt.
 */
export interface AuthInfo {
  readonly username: string;
  readonly version: number;
  readonly modulus: string;
  readonly serverEphemeral: string;
  readonly salt: string;
  readonly srpSession: string;
  readonly twoFactor: boolean;
  readonly serverUsername?: string;
}

/**
 * Values sent to the server for one handshake. expectedServerProof never
 * leaves the process.
 */
export interface ClientProof {
  readonly clientEphemeral: string;
  readonly clientProof: string;
  readonly expectedServerProof: string;
}

export interface SessionCredentials {
  readonly uid: string;
  readonly accessToken: string;
  readonly refreshToken: string;
  readonly tokenType: string;
  readonly scope: string;
  readonly expiresIn: number;
  readonly eventId: string;
  readonly passwordMode: PasswordMode;
  readonly privateKey: string;
  readonly keySalt: string;
}

export interface UnlockedIdentity<TKey> {
  readonly credentials: SessionCredentials;
  readonly keys: readonly TKey[];
}

/**
 * What the server stores for an account: enough to run its half of SRP.
 */
export interface SRPVerifier {
  version: number;
  salt: string;       // Base64-encoded
  verifier: string;   // Base64-encoded, little-endian
}
