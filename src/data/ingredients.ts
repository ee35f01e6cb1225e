import phaseIngredientsData from "../config/phaseIngredients.v1.json";

const UNITS = new Set([
  "cup",
  "cups",
  "c",
  "tbsp",
  "tablespoon",
  "tablespoons",
  "tsp",
  "teaspoon",
  "teaspoons",
  "g",
  "gram",
  "grams",
  "kg",
  "ml",
  "l",
  "liter",
  "liters",
  "oz",
  "ounce",
  "ounces",
  "lb",
  "lbs",
  "pound",
  "pounds",
  "clove",
  "cloves",
  "pinch",
  "dash",
  "handful",
  "can",
  "cans",
  "jar",
  "slice",
  "slices",
  "piece",
  "pieces",
  "bunch",
  "sprig",
  "sprigs",
  "scoop",
  "scoops",
]);

const MODIFIERS = new Set([
  "large",
  "small",
  "medium",
  "fresh",
  "whole",
  "chopped",
  "minced",
  "sliced",
  "diced",
  "grated",
  "shredded",
  "peeled",
  "finely",
  "roughly",
  "thinly",
  "optional",
]);

const CONNECTORS = new Set(["of", "a", "an", "the", "and", "or", "to", "for", "about", "approx"]);

const QUANTITY_PATTERN = /^(\d+([.,/]\d+)?|[½¼¾⅓⅔⅛]|\d+[a-z]+|\d+-\d+)$/;

const asStringArray = (value: unknown): string[] =>
  Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];

export const BASIC_INGREDIENTS = new Set(asStringArray(phaseIngredientsData?.basicIngredients));

export const normalizeIngredientText = (value: string): string => value.toLowerCase().trim().replace(/\s+/g, " ");

const isQuantity = (word: string) => QUANTITY_PATTERN.test(word) || /^\d/.test(word);

const isLeadingNoise = (word: string) =>
  isQuantity(word) || UNITS.has(word) || MODIFIERS.has(word) || CONNECTORS.has(word);

/**
 * Reduces an ingredient line to the ingredient name:
 * "2 cloves garlic, minced" -> "garlic", "1/2 cup rolled oats (gluten-free)" -> "rolled oats".
 */
export const cleanIngredientName = (line: string): string => {
  const withoutNotes = normalizeIngredientText(line)
    .replace(/^[-*•]\s*/, "")
    .replace(/\([^)]*\)/g, " ")
    .split(",")[0]
    .replace(/\bto taste\b/g, " ");

  const words = withoutNotes.split(/\s+/).filter(Boolean);
  while (words.length && isLeadingNoise(words[0])) {
    words.shift();
  }

  return words
    .filter((word) => !MODIFIERS.has(word))
    .join(" ")
    .trim();
};

export const isBasicIngredient = (name: string): boolean => BASIC_INGREDIENTS.has(normalizeIngredientText(name));

/** First ingredient of a recipe that is not a household basic. */
export const getKeyIngredient = (ingredients: string[]): string => {
  const names = ingredients.map(cleanIngredientName).filter(Boolean);
  return names.find((name) => !isBasicIngredient(name)) ?? names[0] ?? "";
};

/**
 * Counts ingredient names across recipes, most frequent first. Ties keep the
 * order in which names were first seen.
 */
export const tallyIngredients = (ingredientLists: string[][], limit: number): string[] => {
  const counts = new Map<string, number>();

  ingredientLists.forEach((ingredients) => {
    ingredients.forEach((line) => {
      const name = cleanIngredientName(line);
      if (!name) return;
      counts.set(name, (counts.get(name) || 0) + 1);
    });
  });

  const firstSeen = Array.from(counts.keys());
  return firstSeen
    .map((name, index) => ({ name, index, count: counts.get(name) || 0 }))
    .sort((left, right) => right.count - left.count || left.index - right.index)
    .slice(0, Math.max(0, limit))
    .map((entry) => entry.name);
};
