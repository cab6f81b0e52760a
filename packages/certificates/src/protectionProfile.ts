import { z } from "zod";

import {
  DecodeError,
  DocSet,
  TYPE_TAG,
  createFrozenSet,
  identityHash,
  type ComplexSerializable,
  type TypeDescriptor,
} from "@docformat/core";

import { sanitizeLink, sanitizeString } from "./sanitize";

export const PROTECTION_PROFILE_TAG = "ProtectionProfile";

export type ProtectionProfileInput = Readonly<{
  name: string | null | undefined;
  link?: string | null;
  ids?: Iterable<string> | null;
}>;

/**
 * Protection profile a certified product claims conformance to.
 */
export class ProtectionProfile implements ComplexSerializable {
  public readonly name: string | null;
  public readonly link: string | null;
  public readonly ids: DocSet<string> | null;

  private constructor(name: string | null, link: string | null, ids: DocSet<string> | null) {
    this.name = name;
    this.link = link;
    this.ids = ids;
    Object.freeze(this);
  }

  /**
   * Sanitizes the input once; an empty id collection is stored as null.
   */
  static create({ name, link = null, ids = null }: ProtectionProfileInput): ProtectionProfile {
    const idSet = ids === null ? null : createFrozenSet(ids);
    return new ProtectionProfile(
      sanitizeString(name),
      sanitizeLink(link),
      idSet !== null && idSet.size > 0 ? idSet : null
    );
  }

  get [TYPE_TAG](): string {
    return PROTECTION_PROFILE_TAG;
  }

  /**
   * Profiles are the same profile when name and link agree.
   */
  equals(other: ProtectionProfile): boolean {
    return this.name === other.name && this.link === other.link;
  }
}

const fieldsSchema = z.object({
  pp_name: z.string().nullable(),
  pp_link: z.string().nullable().optional(),
  pp_ids: z.union([z.instanceof(DocSet), z.array(z.unknown())]).nullable().optional(),
});

const idsFrom = (value: Iterable<unknown> | null | undefined): string[] | null => {
  if (value === null || value === undefined) {
    return null;
  }

  const ids: string[] = [];
  for (const id of value) {
    if (typeof id !== "string") {
      throw new DecodeError(PROTECTION_PROFILE_TAG, "pp_ids must hold strings");
    }
    ids.push(id);
  }
  return ids;
};

export const protectionProfileDescriptor: TypeDescriptor<ProtectionProfile> = {
  encode: (value) => ({
    pp_name: value.name,
    pp_link: value.link,
    pp_ids: value.ids,
  }),

  decode: (fields) => {
    const parsed = fieldsSchema.safeParse(fields);
    if (!parsed.success) {
      throw new DecodeError(PROTECTION_PROFILE_TAG, parsed.error.message, parsed.error);
    }

    return ProtectionProfile.create({
      name: parsed.data.pp_name,
      link: parsed.data.pp_link,
      ids: idsFrom(parsed.data.pp_ids),
    });
  },

  hash: (value) => identityHash([value.name, value.link]),
};
