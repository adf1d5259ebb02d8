/**
 * Query template building blocks shared by the source catalogs.
 */

export interface QueryContext {
  /** Label languages in order of preference */
  languages: readonly string[];
}

export interface FacetTemplate {
  facet: string;
  description: string;
  /** Variable whose URI identifies the entity a row belongs to */
  keyVariable: string;
  /** Variable holding a label usable for name-based key resolution */
  nameVariable?: string;
  render(context: QueryContext): string;
}

/**
 * Wikidata label service clause for the preferred languages.
 */
export function labelService(context: QueryContext): string {
  return `SERVICE wikibase:label { bd:serviceParam wikibase:language "${context.languages.join(",")}" . }`;
}

function languageVariables(
  target: string,
  context: QueryContext
): { language: string; variable: string }[] {
  return context.languages.map((language) => ({
    language,
    variable: `?${target}_${language.replaceAll(/[^a-z]/gi, "")}`,
  }));
}

/**
 * First literal of `predicate` on `subject` in the preferred languages,
 * bound to `?target`. With `fallbackToSubject` the subject URI is used when
 * no literal matches.
 */
export function preferredLiteral(
  subject: string,
  predicate: string,
  target: string,
  context: QueryContext,
  fallbackToSubject = false
): string {
  const variables = languageVariables(target, context);
  const optionals = variables.map(
    ({ language, variable }) =>
      `OPTIONAL { ${subject} ${predicate} ${variable} . FILTER(LANG(${variable}) = "${language}") }`
  );
  const candidates = variables.map(({ variable }) => variable);
  if (fallbackToSubject) {
    candidates.push(`STR(${subject})`);
  }
  return [
    ...optionals,
    `BIND(COALESCE(${candidates.join(", ")}) AS ?${target})`,
  ].join("\n  ");
}

/**
 * Preferred rdfs:label of `subject`, falling back to its URI.
 */
export function preferredLabel(
  subject: string,
  target: string,
  context: QueryContext
): string {
  return preferredLiteral(subject, "rdfs:label", target, context, true);
}
