/**
 * Reserved mapping key naming the encoded kind of a tagged mapping.
 */
export const TYPE_KEY = "_type";

/**
 * Reserved mapping key holding the payload of a tagged set or path.
 */
export const VALUE_KEY = "_value";

/**
 * Reserved mapping key carrying a precomputed identity hash.
 */
export const HASH_KEY = "_hash";

/**
 * FULLWIDTH FULL STOP, stored in place of "." inside mapping keys.
 */
export const DOT_SUBSTITUTE = "．";

export const SET_TAG = "set";
export const FROZENSET_TAG = "frozenset";
export const PATH_TAG = "Path";

/**
 * Tags owned by the format layer itself; domain types cannot claim them.
 */
export const RESERVED_TAGS: ReadonlySet<string> = new Set([
  SET_TAG,
  FROZENSET_TAG,
  PATH_TAG,
]);
