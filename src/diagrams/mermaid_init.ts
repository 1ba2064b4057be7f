/**
 * @fileoverview Mermaid initialization for the rendered site
 *
 * The site loads Mermaid from a `<script>` tag. When the library is on the page,
 * it is configured once with static options; when it is not, nothing happens.
 */

export type MermaidSecurityLevel = 'strict' | 'loose' | 'antiscript' | 'sandbox';

export type MermaidTheme = 'default' | 'base' | 'dark' | 'forest' | 'neutral';

export interface MermaidOptions {
  startOnLoad: boolean;
  securityLevel: MermaidSecurityLevel;
  theme: MermaidTheme;
}

/** The part of the Mermaid global this module touches. */
export interface MermaidLike {
  initialize(options: MermaidOptions): void;
}

export const DIAGRAM_OPTIONS = {
  startOnLoad: true,
  securityLevel: 'strict',
  theme: 'default',
} as const satisfies MermaidOptions;

export function isMermaidLike(value: unknown): value is MermaidLike {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'initialize' in value &&
    typeof value.initialize === 'function'
  );
}

/**
 * Configure the `mermaid` global found on `scope`, if there is one.
 * Returns whether initialization happened.
 */
export function initializeDiagrams(scope: object): boolean {
  const mermaid: unknown = Reflect.get(scope, 'mermaid');
  if (!isMermaidLike(mermaid)) return false;
  mermaid.initialize({ ...DIAGRAM_OPTIONS });
  return true;
}
