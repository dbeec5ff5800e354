import { createHash } from "node:crypto";
import nacl from "tweetnacl";

export const SIGNATURE_ALGORITHM = "ed25519";

export const SIGNATURE_HEADERS = {
  timestamp: "X-Fx-Sentinel-Timestamp",
  signature: "X-Fx-Sentinel-Signature",
  algorithm: "X-Fx-Sentinel-SignatureAlg",
} as const;

export interface CanonicalSignatureInput {
  timestamp: number;
  method: string;
  host: string;
  path: string;
  body: unknown;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => (item === undefined ? null : sortKeysDeep(item)));
  }
  if (!isPlainObject(value)) {
    return value;
  }

  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    if (value[key] !== undefined) {
      sorted[key] = sortKeysDeep(value[key]);
    }
  }
  return sorted;
}

/** JSON with object keys sorted at every depth, so signer and verifier hash the same bytes. */
export function canonicalJsonStringify(value: unknown): string {
  return JSON.stringify(sortKeysDeep(value ?? {})) ?? "{}";
}

export function canonicalBodyHash(body: unknown): string {
  return createHash("sha256").update(canonicalJsonStringify(body), "utf8").digest("hex");
}

export function buildCanonicalSignatureString(input: CanonicalSignatureInput): string {
  const path = input.path.trim() || "/";
  return [
    String(input.timestamp),
    input.method.toUpperCase(),
    input.host.toLowerCase(),
    path.startsWith("/") ? path : `/${path}`,
    canonicalBodyHash(input.body),
  ].join("\n");
}

function decodeBase64Bytes(value: string): Uint8Array {
  return new Uint8Array(Buffer.from(value, "base64"));
}

function ensureSecretKey(secretKeyBase64: string): Uint8Array {
  const decoded = decodeBase64Bytes(secretKeyBase64);
  if (decoded.byteLength !== nacl.sign.secretKeyLength) {
    throw new Error("ALERT_SIGNING_PRIVATE_KEY must be base64 encoded 64-byte Ed25519 secret key");
  }
  return decoded;
}

export function derivePublicKeyFromPrivateKey(secretKeyBase64: string): string {
  const keyPair = nacl.sign.keyPair.fromSecretKey(ensureSecretKey(secretKeyBase64));
  return Buffer.from(keyPair.publicKey).toString("base64");
}

export function signCanonicalString(canonicalString: string, secretKeyBase64: string): string {
  const signature = nacl.sign.detached(
    new TextEncoder().encode(canonicalString),
    ensureSecretKey(secretKeyBase64),
  );
  return Buffer.from(signature).toString("base64");
}

export function verifyCanonicalStringSignature(options: {
  canonicalString: string;
  signatureBase64: string;
  publicKeyBase64: string;
}): boolean {
  const publicKey = decodeBase64Bytes(options.publicKeyBase64);
  const signature = decodeBase64Bytes(options.signatureBase64);

  if (publicKey.byteLength !== nacl.sign.publicKeyLength) {
    return false;
  }
  if (signature.byteLength !== nacl.sign.signatureLength) {
    return false;
  }

  return nacl.sign.detached.verify(
    new TextEncoder().encode(options.canonicalString),
    signature,
    publicKey,
  );
}

export function createSignedWebhookHeaders(options: {
  url: string;
  method: string;
  body: unknown;
  signingPrivateKeyBase64: string;
  timestamp?: number;
}): { headers: Record<string, string>; canonicalString: string } {
  const timestamp = options.timestamp ?? Math.floor(Date.now() / 1000);
  const url = new URL(options.url);
  const canonicalString = buildCanonicalSignatureString({
    timestamp,
    method: options.method,
    host: url.host,
    path: url.pathname,
    body: options.body,
  });

  return {
    headers: {
      [SIGNATURE_HEADERS.timestamp]: String(timestamp),
      [SIGNATURE_HEADERS.signature]: signCanonicalString(
        canonicalString,
        options.signingPrivateKeyBase64,
      ),
      [SIGNATURE_HEADERS.algorithm]: SIGNATURE_ALGORITHM,
    },
    canonicalString,
  };
}
