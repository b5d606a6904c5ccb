/**
 * Node and token kinds are small integers owned by the grammar. The tree
 * only compares them for equality; numeric enums work directly as kinds.
 */
export type RawSyntaxKind = number;

/**
 * Optional grammar description used for rendering and fixed-text tokens.
 */
export interface SyntaxSpec {
  name?(kind: RawSyntaxKind): string | undefined;
  staticText?(kind: RawSyntaxKind): string | undefined;
}

export function formatKind(kind: RawSyntaxKind, spec?: SyntaxSpec): string {
  return spec?.name?.(kind) ?? `SyntaxKind(${kind})`;
}

/**
 * Build a SyntaxSpec from a numeric enum. `staticTexts` maps enum member
 * names to the fixed text of that kind, e.g. `{ Plus: '+' }`.
 */
export function syntaxFromEnum(
  kinds: Readonly<Record<string, string | number>>,
  staticTexts: Readonly<Record<string, string>> = {}
): SyntaxSpec {
  // Numeric enums are reverse mapped: kinds[1] === 'Plus'.
  const names = new Map<RawSyntaxKind, string>();
  for (const [name, value] of Object.entries(kinds)) {
    if (typeof value === 'number') names.set(value, name);
  }
  return {
    name: kind => names.get(kind),
    staticText: kind => {
      const name = names.get(kind);
      return name === undefined ? undefined : staticTexts[name];
    },
  };
}
