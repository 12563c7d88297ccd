/**
 * Branded Types for plugsmith
 *
 * These types use TypeScript's structural typing with brand symbols to create
 * nominal types. Once a value has been coerced to a branded type, its validity
 * is guaranteed by the type system - no runtime checks needed in core logic.
 *
 * Only coercion functions in ./coerce.ts should create branded values.
 */

// === BRAND SYMBOLS ===

declare const NonEmptyStringBrand: unique symbol
declare const ExtensionNameBrand: unique symbol
declare const AbsolutePathBrand: unique symbol
declare const GitUrlBrand: unique symbol
declare const GithubRepoBrand: unique symbol
declare const GitReferenceBrand: unique symbol

// === BRANDED TYPES ===

/**
 * A non-empty, trimmed string.
 * Guarantees: length > 0, no leading/trailing whitespace
 */
export type NonEmptyString = string & { readonly [NonEmptyStringBrand]: true }

/**
 * The unique key of an extension, also its directory name.
 * Guarantees: non-empty, trimmed, a single path segment
 */
export type ExtensionName = string & { readonly [ExtensionNameBrand]: true }

/**
 * An absolute filesystem path.
 * Guarantees: absolute, normalized (no . or ..)
 */
export type AbsolutePath = string & { readonly [AbsolutePathBrand]: true }

/**
 * A clonable repository URL, kept verbatim.
 * Guarantees: http(s), ssh, git or file scheme, or scp-like user@host:path
 */
export type GitUrl = string & { readonly [GitUrlBrand]: true }

/**
 * A hosted repository shorthand (owner/name) or a full http(s) URL.
 */
export type GithubRepo = string & { readonly [GithubRepoBrand]: true }

/**
 * A branch, tag or commit name. Which of the three it is gets decided at
 * checkout time, never from its shape.
 * Guarantees: non-empty, no whitespace, does not start with "-"
 */
export type GitReference = string & { readonly [GitReferenceBrand]: true }
