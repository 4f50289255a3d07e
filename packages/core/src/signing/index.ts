import { createHash } from "crypto";
import type { FieldSet } from "../fields";
import type { Credentials, SignatureAlgorithm } from "../types";

export type DigestAlgorithm = "md5" | "sha1" | "sha256" | "sha512";

/**
 * Appends authentication fields to a request. Implementations return a new
 * field set and leave the input untouched.
 */
export interface RequestSigner {
  sign(fields: FieldSet, credentials: Credentials): FieldSet;
}

export const MISSING_SIGNATURE_WARNING =
  "Requests are sent without a SHA signature. Signing will become mandatory; " +
  "configure a secret, or set signatureAlgorithm to 'none' to disable signing explicitly.";

/**
 * Computes a lowercase hexadecimal digest of a UTF-8 string.
 *
 * @param algorithm - The digest algorithm
 * @param input - The string to digest
 * @returns Hex-encoded digest
 */
export function hexDigest(algorithm: DigestAlgorithm, input: string): string {
  return createHash(algorithm).update(input, "utf8").digest("hex");
}

/**
 * Signs with an unkeyed digest of the shared secret alone, attached as a
 * dedicated field.
 */
export class HashedSecretSigner implements RequestSigner {
  /**
   * @param fieldName - Field that carries the hashed secret (e.g. "key")
   * @param algorithm - Digest applied to the secret
   */
  constructor(
    private readonly fieldName: string,
    private readonly algorithm: DigestAlgorithm = "md5",
  ) {}

  sign(fields: FieldSet, credentials: Credentials): FieldSet {
    const signed = fields.clone();
    signed.set(this.fieldName, hexDigest(this.algorithm, credentials.secret ?? ""));
    return signed;
  }
}

export interface CanonicalSignerOptions {
  /** Field that carries the signature (e.g. "SHASign") */
  fieldName: string;
  /**
   * Ordered field names concatenated when no explicit algorithm is configured.
   */
  legacyFields: readonly string[];
  /** Called instead of `console.warn` when requests go out unsigned */
  warn?: (message: string) => void;
}

/**
 * Signs with a digest over a canonical string built from the request fields
 * and the shared secret.
 *
 * With an explicit algorithm the fields are sorted case-insensitively by name
 * and joined as `NAME=value`, using the secret as separator. Without one, the
 * legacy field list is concatenated as-is. The secret is appended once more
 * before digesting. `sha256` and `sha512` select their digest; any other
 * setting, `none` included, digests with SHA-1.
 *
 * Requests go out unsigned only when no secret is configured. `none` then
 * suppresses the deprecation warning.
 */
export class CanonicalSigner implements RequestSigner {
  private readonly options: CanonicalSignerOptions;

  constructor(options: CanonicalSignerOptions) {
    this.options = options;
  }

  sign(fields: FieldSet, credentials: Credentials): FieldSet {
    const signed = fields.clone();
    const algorithm = credentials.signatureAlgorithm;
    const secret = credentials.secret ?? "";

    if (secret === "") {
      if (algorithm !== "none") {
        (this.options.warn ?? console.warn)(MISSING_SIGNATURE_WARNING);
      }
      return signed;
    }

    const digest = hexDigest(digestFor(algorithm), this.canonicalString(fields, credentials));
    signed.set(this.options.fieldName, digest.toUpperCase());
    return signed;
  }

  /**
   * Builds the exact string that is digested, secret included.
   *
   * @param fields - The unsigned request fields
   * @param credentials - Credentials carrying the secret and algorithm
   * @returns The canonical string
   */
  canonicalString(fields: FieldSet, credentials: Credentials): string {
    const secret = credentials.secret ?? "";

    const body = credentials.signatureAlgorithm
      ? fields
          .entries()
          .sort(([a], [b]) => compareUpperCase(a, b))
          .map(([name, value]) => `${name.toUpperCase()}=${value}`)
          .join(secret)
      : this.options.legacyFields.map(name => fields.get(name) ?? "").join("");

    return body + secret;
  }
}

function digestFor(algorithm: SignatureAlgorithm | undefined): DigestAlgorithm {
  switch (algorithm) {
    case "sha256":
      return "sha256";
    case "sha512":
      return "sha512";
    default:
      return "sha1";
  }
}

function compareUpperCase(a: string, b: string): number {
  const left = a.toUpperCase();
  const right = b.toUpperCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}
