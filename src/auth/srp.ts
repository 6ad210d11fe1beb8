import { randomBytes } from 'crypto';
import { AuthInfo, ClientProof, SRPVerifier } from '../types/auth';
import { verifyAndGetModulus } from './srp/modulus';
import { hashPassword } from './srp/passwords';
import { generateProofs, generateVerifier, verifyServerProof } from './srp/proofs';
import { checkUsername } from './srp/username';
import { arrayToBinaryString, fromBase64, toBase64 } from './srp/utils';
import { CURRENT_AUTH_VERSION, SRP_LEN, SRP_MODULUS_KEY, VERIFIER_SALT_LEN } from './srp/constants';
import { AppError, ErrorCode } from '../errors/types';

export interface SRPClientOptions {
  /** Armored public key that signs server moduli */
  modulusKey?: string;
}

/**
 * SRP-6a client for the mail API's 2048-bit, expand-hash variant
 */
export class SRPClient {
  private readonly modulusKey: string;

  constructor(options: SRPClientOptions = {}) {
    this.modulusKey = options.modulusKey ?? SRP_MODULUS_KEY;
  }

  /**
   * Compute a fresh client ephemeral and proof for one handshake
   * @param password - Login password
   * @param info - Parameters from /auth/info; consumed by this call
   * @param username - Needed by auth versions below 3
   */
  async computeProof(password: string, info: AuthInfo, username: string = info.username): Promise<ClientProof> {
    if (!checkUsername(info.version, username, info.serverUsername)) {
      throw new AppError(
        'Please log in with your full account username',
        ErrorCode.VALIDATION_ERROR,
        { version: info.version }
      );
    }

    const modulusArray = await verifyAndGetModulus(info.modulus, this.modulusKey);

    const serverEphemeralArray = fromBase64(info.serverEphemeral);
    if (!serverEphemeralArray) {
      throw new AppError('SRP server ephemeral is not base64', ErrorCode.INVALID_SERVER_EPHEMERAL);
    }

    const hashedPasswordArray = await hashPassword({
      version: info.version,
      password,
      salt: info.version >= 3 ? decodeSalt(info.salt) : undefined,
      username,
      modulus: modulusArray,
    });

    const proofs = generateProofs({
      byteLength: SRP_LEN,
      modulusArray,
      hashedPasswordArray,
      serverEphemeralArray,
    });

    return {
      clientEphemeral: toBase64(proofs.clientEphemeral),
      clientProof: toBase64(proofs.clientProof),
      expectedServerProof: toBase64(proofs.expectedServerProof),
    };
  }

  /**
   * Verify server proof matches expected value
   * @throws AppError(SERVER_PROOF_MISMATCH)
   */
  verifyServerProof(expectedServerProof: string, serverProof: string): void {
    verifyServerProof(expectedServerProof, serverProof);
  }

  /**
   * Compute what the server stores for a password: used when creating an
   * account or changing its password.
   */
  async computeVerifier(
    password: string,
    { modulus, salt, version = CURRENT_AUTH_VERSION }: { modulus: string; salt?: string; version?: number }
  ): Promise<SRPVerifier> {
    if (version < 3) {
      throw new AppError('Verifiers are only generated for auth version 3 and above', ErrorCode.UNSUPPORTED_AUTH_VERSION, { version });
    }

    const modulusArray = await verifyAndGetModulus(modulus, this.modulusKey);
    const saltBase64 = salt ?? toBase64(randomBytes(VERIFIER_SALT_LEN));

    const hashedPasswordArray = await hashPassword({
      version,
      password,
      salt: decodeSalt(saltBase64),
      modulus: modulusArray,
    });

    const verifier = generateVerifier({ byteLength: SRP_LEN, modulusArray, hashedPasswordArray });

    return { version, salt: saltBase64, verifier: toBase64(verifier) };
  }
}

function decodeSalt(salt: string): string {
  const bytes = fromBase64(salt);
  if (!bytes || bytes.length === 0) {
    throw new AppError('SRP salt is not base64', ErrorCode.VALIDATION_ERROR);
  }
  return arrayToBinaryString(bytes);
}
