/**
 * Injection engine: splices a CSS theme and script into a host script at a
 * unique anchor and takes it back out again.
 *
 * The block hands a page script to `executeJavaScript` as a template literal.
 * The page script is escaped once for that literal, so the page receives it
 * exactly as rendered, and the CSS travels inside it as a JSON string literal.
 * Payloads are therefore taken as plain text; {@link validatePayload} only
 * rejects what the engine cannot embed and recover.
 */
import { InjectionError } from './types/errors.js';
import type { InjectionConfig, InjectionPayload, TextRange } from './types/injection.js';

const INDENT = '        ';
const BLOCK_CLOSE = '`);\n});';
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Escapes `text` so an untagged template literal evaluates to `text` itself.
 * Carriage returns are escaped because template literals normalize raw ones.
 */
function escapeTemplateText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/`/g, '\\`')
    .replace(/\$\{/g, '\\${')
    .replace(/\r/g, '\\r');
}

function unescapeTemplateText(text: string): string {
  return text.replace(/\\([\\`$r])/g, (_escape: string, char: string) => (char === 'r' ? '\r' : char));
}

function blockOpen(config: InjectionConfig): string {
  return `${config.hostExpression}.on('dom-ready', () => {\n    ${config.hostExpression}.executeJavaScript(\``;
}

function cssDeclaration(config: InjectionConfig): string {
  return `\n${INDENT}let ${config.guardToken} = `;
}

function styleStatements(config: InjectionConfig): string {
  return [
    ';',
    `${INDENT}const style = document.createElement('style');`,
    `${INDENT}style.textContent = ${config.guardToken};`,
    `${INDENT}document.head.appendChild(style);`,
    `${INDENT}${config.beginSentinel}`,
    '',
  ].join('\n');
}

function scriptTail(config: InjectionConfig): string {
  return `\n${INDENT}${config.endSentinel}\n    `;
}

/**
 * Code the block runs in the page once the DOM is ready.
 */
export function renderPageScript(payload: InjectionPayload, config: InjectionConfig): string {
  return (
    cssDeclaration(config) +
    JSON.stringify(payload.css) +
    styleStatements(config) +
    payload.js +
    scriptTail(config)
  );
}

/**
 * Generates the injected block. The anchor is not part of it.
 */
export function renderBlock(payload: InjectionPayload, config: InjectionConfig): string {
  return blockOpen(config) + escapeTemplateText(renderPageScript(payload, config)) + BLOCK_CLOSE;
}

/**
 * Rejects configs whose markers are empty, since an empty marker matches everywhere.
 * @throws {InjectionError} `InvalidConfig`
 */
export function assertInjectionConfig(config: InjectionConfig): void {
  for (const [field, value] of Object.entries(config)) {
    if (typeof value !== 'string' || value.trim() === '') {
      throw new InjectionError('InvalidConfig', `Injection config field "${field}" must be a non-empty string`);
    }
  }
  if (!/^[A-Za-z_$][\w$]*$/.test(config.guardToken)) {
    throw new InjectionError('InvalidConfig', `Guard token "${config.guardToken}" is not a valid identifier`);
  }
}

/**
 * Locates the single occurrence of the anchor. Overlapping occurrences count.
 *
 * @throws {InjectionError} `AnchorNotFound` or `AmbiguousAnchor`
 */
export function findAnchor(text: string, config: InjectionConfig): TextRange {
  const start = text.indexOf(config.anchor);
  if (start === -1) {
    throw new InjectionError('AnchorNotFound', `Anchor "${config.anchor}" was not found in the host script`);
  }
  const second = text.indexOf(config.anchor, start + 1);
  if (second !== -1) {
    throw new InjectionError(
      'AmbiguousAnchor',
      `Anchor "${config.anchor}" occurs more than once (at ${start} and ${second}); the host script has changed shape`
    );
  }
  return { start, end: start + config.anchor.length };
}

export function isAlreadyPatched(text: string, config: InjectionConfig): boolean {
  return text.includes(config.guardToken);
}

/**
 * Rejects payloads that carry the block's own markers, and scripts with
 * unpaired surrogates, which cannot be stored as UTF-8 and read back.
 *
 * @throws {InjectionError} `PayloadEscapeViolation`
 */
export function validatePayload(payload: InjectionPayload, config: InjectionConfig): void {
  const markers = [config.guardToken, config.beginSentinel, config.endSentinel];
  for (const [name, value] of [['CSS', payload.css], ['JS', payload.js]] as const) {
    const marker = markers.find((candidate) => value.includes(candidate));
    if (marker !== undefined) {
      throw new InjectionError('PayloadEscapeViolation', `${name} payload contains the reserved marker "${marker}"`);
    }
  }
  const surrogate = LONE_SURROGATE.exec(payload.js);
  if (surrogate) {
    throw new InjectionError('PayloadEscapeViolation', `JS payload has an unpaired surrogate at ${surrogate.index}`);
  }
}

/**
 * Replaces the anchor span with the generated block followed by the anchor
 * text itself, so the host's own statement still runs.
 *
 * @throws {InjectionError} `PayloadEscapeViolation` when a payload cannot be embedded
 */
export function inject(text: string, range: TextRange, payload: InjectionPayload, config: InjectionConfig): string {
  validatePayload(payload, config);
  const anchor = text.slice(range.start, range.end);
  return text.slice(0, range.start) + renderBlock(payload, config) + anchor + text.slice(range.end);
}

interface LocatedBlock {
  readonly start: number;
  readonly end: number;
  readonly payload: InjectionPayload;
}

function malformed(detail: string): InjectionError {
  return new InjectionError('MalformedInjection', `Injected block ${detail}`);
}

function readCss(literal: string): string {
  let css: unknown;
  try {
    css = JSON.parse(literal);
  } catch (error) {
    throw malformed(`has an unreadable CSS literal: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (typeof css !== 'string') {
    throw malformed('has a CSS literal that is not a string');
  }
  return css;
}

function locateBlock(text: string, config: InjectionConfig): LocatedBlock | undefined {
  const open = blockOpen(config);
  const start = text.indexOf(open + escapeTemplateText(cssDeclaration(config)));
  if (start === -1) {
    return undefined;
  }
  const close = escapeTemplateText(scriptTail(config)) + BLOCK_CLOSE;
  const closeAt = text.indexOf(close, start);
  if (closeAt === -1) {
    throw malformed('has no end marker');
  }
  const end = closeAt + close.length;

  const script = unescapeTemplateText(text.slice(start + open.length, end - BLOCK_CLOSE.length));
  const cssStart = cssDeclaration(config).length;
  const statements = styleStatements(config);
  // JSON string literals contain no raw line breaks, so the first match ends the CSS
  const cssEnd = script.indexOf(statements, cssStart);
  if (cssEnd === -1) {
    throw malformed('has no style statements');
  }
  const payload: InjectionPayload = {
    css: readCss(script.slice(cssStart, cssEnd)),
    js: script.slice(cssEnd + statements.length, script.length - scriptTail(config).length),
  };
  if (renderBlock(payload, config) !== text.slice(start, end)) {
    throw malformed('was edited and cannot be removed safely');
  }
  if (!text.startsWith(config.anchor, end)) {
    throw malformed('is not followed by the anchor');
  }
  return { start, end, payload };
}

/**
 * Returns the payload currently embedded in `text`, if any.
 * @throws {InjectionError} `MalformedInjection` when a block is present but damaged
 */
export function extractPayload(text: string, config: InjectionConfig): InjectionPayload | undefined {
  return locateBlock(text, config)?.payload;
}

/**
 * Cuts the injected block out of `text`, leaving the anchor where it was.
 * Text without a block is returned unchanged.
 *
 * @throws {InjectionError} `MalformedInjection` when a block is present but damaged
 */
export function removeInjection(text: string, config: InjectionConfig): string {
  const block = locateBlock(text, config);
  if (!block) {
    return text;
  }
  return text.slice(0, block.start) + text.slice(block.end);
}
