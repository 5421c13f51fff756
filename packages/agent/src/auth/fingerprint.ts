// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Fingerprint authenticator: verifies the hub's signature over the agent
 * token against the configured ed25519 hub keys.
 */

import {
  createHash,
  createPublicKey,
  verify,
  type KeyObject,
} from "node:crypto";
import type { FingerprintResponse } from "../schemas.js";

const PEM_BLOCK =
  /-----BEGIN PUBLIC KEY-----[\s\S]+?-----END PUBLIC KEY-----/g;

const ED25519_SIGNATURE_BYTES = 64;

/**
 * Parse one or more concatenated PEM public keys. Only ed25519 is accepted.
 */
export function parsePublicKeys(pem: string): KeyObject[] {
  const blocks = pem.match(PEM_BLOCK) ?? [];
  return blocks.map((block, index) => {
    const key = createPublicKey(block);
    if (key.asymmetricKeyType !== "ed25519") {
      throw new Error(
        `Hub key #${index + 1} is ${key.asymmetricKeyType ?? "unknown"}, expected ed25519`,
      );
    }
    return key;
  });
}

export function deriveFingerprint(hostname: string): string {
  return createHash("sha256").update(hostname).digest("hex");
}

export interface FingerprintAuthenticatorOptions {
  /** Message the hub signs */
  token: string;
  hubKeys: readonly KeyObject[];
  fingerprint: string;
  hostname: string;
  port: number;
}

export class FingerprintAuthenticator {
  private readonly message: Buffer;

  constructor(private readonly options: FingerprintAuthenticatorOptions) {
    this.message = Buffer.from(options.token, "utf8");
  }

  /**
   * True when `signature` (base64) was made over the token by any hub key.
   */
  verify(signature: string | undefined): boolean {
    if (!signature) {
      return false;
    }
    const bytes = Buffer.from(signature, "base64");
    if (bytes.length !== ED25519_SIGNATURE_BYTES) {
      return false;
    }
    return this.options.hubKeys.some((key) =>
      verify(null, this.message, key, bytes),
    );
  }

  response(needSysInfo: boolean): FingerprintResponse {
    if (!needSysInfo) {
      return { fingerprint: this.options.fingerprint };
    }
    return {
      fingerprint: this.options.fingerprint,
      hostname: this.options.hostname,
      port: this.options.port,
    };
  }
}
