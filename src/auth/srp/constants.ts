/**
 * Fixed SRP protocol parameters
 */

// 2048-bit modulus, in bytes
export const SRP_LEN = 256;

export const SRP_GENERATOR = 2n;

export const BCRYPT_PREFIX = '$2y$10$';

// Appended to the account salt before bcrypt in auth versions 3 and 4
export const SALT_SUFFIX = 'proton';

export const CURRENT_AUTH_VERSION = 4;

// Number of random salt bytes generated for a new verifier
export const VERIFIER_SALT_LEN = 10;

// Key salts are always 16 bytes (bcrypt's salt size)
export const KEY_SALT_LEN = 16;

// Miller-Rabin rounds used when validating a server modulus
export const MODULUS_PRIME_ROUNDS = 10;

/**
 * Public key that signs every modulus the server hands out
 */
export const SRP_MODULUS_KEY = `-----BEGIN PGP PUBLIC KEY BLOCK-----

xjMEXAHLgxYJKwYBBAHaRw8BAQdAFurWXXwjTemqjD7CXjXVyKf0of7n9Ctm
L8v9enkzggHNEnByb3RvbkBzcnAubW9kdWx1c8J3BBAWCgApBQJcAcuDBgsJ
BwgDAgkQNQWFxOlRjyYEFQgKAgMWAgECGQECGwMCHgEAAPGRAP9sauJsW12U
MnTQUZpsbJb53d0Wv55mZIIiJL2XulpWPQD/V6NglBd96lZKBmInSXX/kXat
Sv+y0io+LR8i2+jV+AbOOARcAcuDEgorBgEEAZdVAQUBAQdAeJHUz1c9+KfE
kSIgcBRE3WuXC4oj5a2/U3oASExGDW4DAQgHwmEEGBYIABMFAlwBy4MJEDUF
hcTpUY8mAhsMAAD/XQD8DxNI6E78meodQI+wLsrKLeHn32iLvUqJbVDhfWSU
WO4BAMcm1u02t4VKw++ttECPt+HUgPUq5pqQWe5Q2cW4TMsE
=Y4Mw
-----END PGP PUBLIC KEY BLOCK-----`;
