/**
 * Identity hasher - deterministic content address of a schema.
 *
 * The signature lists every field as `name:type:isOptional` in declaration
 * order. Two schemas share a hash exactly when their signatures agree, so the
 * hash depends on nothing but the field sequence.
 */

import { createHash } from "node:crypto";
import { Identity, Schema } from "../types.js";

export const SHORT_HASH_LENGTH = 8;

export const fieldSignature = (field: Schema["fields"][number]): string =>
  `${field.name}:${field.declaredType.fullyQualifiedName}:${String(field.isOptional)}`;

export const schemaSignature = (schema: Schema): string =>
  schema.fields.map(fieldSignature).join("|");

/**
 * Full SHA-256 digest of a signature as uppercase hex (64 chars).
 */
export const digestSignature = (signature: string): string =>
  createHash("sha256").update(signature, "utf8").digest("hex").toUpperCase();

export const computeIdentity = (
  schema: Schema,
  length = SHORT_HASH_LENGTH
): Identity => {
  const signature = schemaSignature(schema);
  return {
    hash: digestSignature(signature).slice(0, length),
    signature,
  };
};
