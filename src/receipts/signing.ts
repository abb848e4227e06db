import { createPrivateKey, createPublicKey, sign, verify } from "crypto";
import type { KeyObject } from "crypto";
import { promises as fs } from "fs";
import { sha256Prefixed } from "../core/canonicalJson.js";
import type { GenerationReceipt, ReceiptSignature } from "./receipt.js";
import { signingPayload } from "./receipt.js";

export interface ReceiptSigner {
  privateKey: KeyObject;
  publicKeyBase64: string;
  keyId: `sha256:${string}`;
}

export function signerFromPrivateKey(privateKey: KeyObject): ReceiptSigner {
  if (privateKey.asymmetricKeyType !== "ed25519") {
    throw new Error(`receipt signing key must be ed25519, got ${privateKey.asymmetricKeyType ?? "unknown"}`);
  }
  const spki = createPublicKey(privateKey).export({ format: "der", type: "spki" });
  return { privateKey, publicKeyBase64: spki.toString("base64"), keyId: sha256Prefixed(spki) };
}

export async function loadSignerFromPemFile(filePath: string): Promise<ReceiptSigner> {
  const pem = await fs.readFile(filePath, "utf8");
  return signerFromPrivateKey(createPrivateKey(pem));
}

export function signReceipt(receipt: GenerationReceipt, signer: ReceiptSigner): ReceiptSignature {
  const sig = sign(null, Buffer.from(signingPayload(receipt), "utf8"), signer.privateKey);
  return { alg: "ed25519", key_id: signer.keyId, public_key: signer.publicKeyBase64, sig_base64: sig.toString("base64") };
}

/** Returns null when the signature holds, otherwise the reason it does not. */
export function checkReceiptSignature(doc: Record<string, unknown>, signature: ReceiptSignature): string | null {
  const spki = Buffer.from(signature.public_key, "base64");
  if (sha256Prefixed(spki) !== signature.key_id) return "key_id does not match public_key";
  let publicKey: KeyObject;
  try {
    publicKey = createPublicKey({ key: spki, format: "der", type: "spki" });
  } catch (err) {
    return `public_key is not a valid key: ${err instanceof Error ? err.message : String(err)}`;
  }
  if (publicKey.asymmetricKeyType !== "ed25519") return "public_key is not an ed25519 key";
  const ok = verify(null, Buffer.from(signingPayload(doc), "utf8"), publicKey, Buffer.from(signature.sig_base64, "base64"));
  return ok ? null : "signature does not match receipt contents";
}
