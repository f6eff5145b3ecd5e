// Identifier case conversion.

export type CaseStyle = "pascal" | "camel" | "snake" | "preserve";

/**
 * Split an identifier into words at underscores, hyphens and case changes.
 * `HTTPServer` splits into `HTTP` and `Server`.
 */
export function splitWords(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
    .split(/[\s_-]+/)
    .filter((word) => word.length > 0);
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export function convertCase(name: string, style: CaseStyle): string {
  if (style === "preserve") return name;
  const words = splitWords(name);
  switch (style) {
    case "pascal":
      return words.map(capitalize).join("");
    case "camel":
      return words.map((word, index) => (index === 0 ? word.toLowerCase() : capitalize(word))).join("");
    case "snake":
      return words.map((word) => word.toLowerCase()).join("_");
  }
}
