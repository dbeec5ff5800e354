import { randomBytes } from "node:crypto";
import nacl from "tweetnacl";

function generateSigningKey() {
  const keypair = nacl.sign.keyPair();

  return {
    private: Buffer.from(keypair.secretKey).toString("base64"),
    public: Buffer.from(keypair.publicKey).toString("base64"),
  };
}

const signing = generateSigningKey();
const statusToken = randomBytes(32).toString("base64url");

console.log("=== FX RATE SENTINEL KEYS ===\n");

console.log("ALERT_SIGNING_PRIVATE_KEY=");
console.log(signing.private);

console.log("\nALERT_SIGNING_PUBLIC_KEY (share with webhook receivers):");
console.log(signing.public);

console.log("\nSTATUS_API_TOKEN=");
console.log(statusToken);

console.log("\n=============================");
