import type { AnonMap } from "../cache-key/anon-map";

/**
 * A generated name whose final spelling is decided per traversal.
 *
 * Two anonymous names derived from the same source object render to the same
 * string within one `AnonMap`; names from different sources never do.
 */
export class AnonymousName {
  readonly source: object;
  readonly label: string;

  constructor(source: object, label: string) {
    this.source = source;
    this.label = label;
  }

  apply(anonMap: AnonMap): string {
    return `${this.label}_${anonMap.idFor(this.source)}`;
  }

  get description(): string {
    return `<anonymous ${this.label}>`;
  }
}

/**
 * Renders a name without an anon map, for compiled output and messages.
 */
export function renderName(
  name: string | AnonymousName,
  fallbackIndex = 1,
): string {
  return typeof name === "string" ? name : `${name.label}_${fallbackIndex}`;
}
