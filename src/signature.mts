import crypto from "crypto";

export const SIGNATURE_PREFIX = "sha256=";

/**
 * Computes the `sha256=`-prefixed HMAC hex digest GitHub sends in
 * `X-Hub-Signature-256`, and the release workflow uses for artifact checksums.
 */
export function sign(secret: string, body: Buffer | string): string {
  return (
    SIGNATURE_PREFIX +
    crypto.createHmac("sha256", secret).update(body).digest("hex")
  );
}

/**
 * Compares two signatures in constant time. Signatures of different length
 * never match.
 */
export function signaturesEqual(expected: string, provided: string): boolean {
  const a = Buffer.from(expected, "utf8");
  const b = Buffer.from(provided, "utf8");
  if (a.length !== b.length) {
    return false;
  }
  return crypto.timingSafeEqual(a, b);
}

/**
 * Checks a webhook signature against every configured secret. The payload's
 * own repository claim is not consulted here: the matching secret is what
 * identifies the sender.
 * @param body The raw request body, exactly as received.
 * @param signature The `X-Hub-Signature-256` header value.
 * @param identities The configured identities and their secrets.
 * @returns The identities whose secret produced the signature.
 */
export function verifySignature<T extends { secret: string }>(
  body: Buffer | string,
  signature: string | null | undefined,
  identities: Iterable<T>
): T[] {
  if (signature == null || !signature.startsWith(SIGNATURE_PREFIX)) {
    return [];
  }

  const matches: T[] = [];
  for (const identity of identities) {
    if (signaturesEqual(sign(identity.secret, body), signature)) {
      matches.push(identity);
    }
  }
  return matches;
}
