/**
 * Fixed string rendering for signatures and property blocks.
 * Canonical forms are compared as text, so every value goes through here.
 */

import type { Property, PropertyValue, ValueFormatter } from "./model.js";

export function formatPropertyValue(value: PropertyValue): string {
  if (value === null) return "null";
  if (Array.isArray(value)) {
    return `[${value.map(formatPropertyValue).join(", ")}]`;
  }
  if (typeof value === "string") return JSON.stringify(value);
  return String(value);
}

/**
 * Sort, then drop adjacent duplicates.
 */
function sortedUnique(values: string[]): string[] {
  values.sort();
  return values.filter((value, i) => i === 0 || value !== values[i - 1]);
}

/**
 * `{ a: 1, b: "x" }`, sorted by the rendered `key: value` entry.
 * An empty mapping renders as "".
 */
export function formatProperties<V>(
  properties: Iterable<Property<V>>,
  formatValue: ValueFormatter<V>
): string {
  const entries: string[] = [];
  for (const [key, value] of properties) {
    entries.push(`${key}: ${formatValue(value)}`);
  }

  if (entries.length === 0) return "";
  return `{ ${sortedUnique(entries).join(", ")} }`;
}

/**
 * `:A:B`, sorted and deduplicated.
 */
export function formatLabels(labels: Iterable<string>): string {
  return sortedUnique(Array.from(labels))
    .map((label) => `:${label}`)
    .join("");
}

/**
 * Signature of a node from its own content: `(:A:B { k: v })`.
 */
export function nodeSignature<V>(
  labels: Iterable<string>,
  properties: Iterable<Property<V>>,
  formatValue: ValueFormatter<V>
): string {
  return `(${formatLabels(labels)} ${formatProperties(properties, formatValue)})`;
}

export function outgoingEntry(type: string | undefined, properties: string, target: string): string {
  return `()-[:${type ?? ""} ${properties}]->${target}`;
}

export function incomingEntry(type: string | undefined, properties: string, source: string): string {
  return `()<-[:${type ?? ""} ${properties}]-${source}`;
}
