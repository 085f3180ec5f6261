/**
 * Types for the script injection engine.
 */

/**
 * Strings the engine searches for and emits. Passed into every engine call
 * so a host script update only needs a new config.
 */
export interface InjectionConfig {
  /** Statement fragment that must occur exactly once in the host script. */
  readonly anchor: string;
  /** Identifier bound to the CSS text; its presence means the script is already patched. */
  readonly guardToken: string;
  /** Expression the generated `dom-ready` handler is registered on. */
  readonly hostExpression: string;
  readonly beginSentinel: string;
  readonly endSentinel: string;
}

/**
 * Half-open range of UTF-16 code units in the decoded host text.
 */
export interface TextRange {
  readonly start: number;
  readonly end: number;
}

export interface InjectionPayload {
  /** Theme CSS as written; the engine encodes it. */
  readonly css: string;
  /** Script the page runs after the style is added, between the sentinels. */
  readonly js: string;
}
