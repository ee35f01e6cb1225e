import phaseIngredientsData from "../config/phaseIngredients.v1.json";
import { cleanIngredientName, isBasicIngredient } from "../data/ingredients";
import type { Recipe } from "../data/query";
import type { FunctionalPhase } from "../planner/phaseModels";
import { titleCase } from "../planner/guidance";

export type ShoppingCategory = "proteins" | "vegetables" | "fruits" | "pantry" | "others";

export type ShoppingList = {
  categories: Partial<Record<string, string[]>>;
  /** Household basics, listed separately for the user to check. */
  basics: string[];
};

const SHOPPING_CATEGORIES: ShoppingCategory[] = ["proteins", "vegetables", "fruits", "pantry", "others"];

const PHASE_CATEGORY_ORDER = ["proteins", "vegetables", "fruits", "fats", "carbohydrates", "supplements", "others"];

const CATEGORY_ICONS: Record<string, string> = {
  proteins: "🥩",
  vegetables: "🥬",
  fruits: "🍎",
  fats: "🥑",
  carbohydrates: "🍠",
  supplements: "💊",
  pantry: "🫙",
  others: "🧺",
};

const asStringList = (value: unknown): string[] =>
  Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];

const asCategoryMap = (value: unknown): Map<string, string[]> =>
  new Map(
    value && typeof value === "object"
      ? Object.entries(value).map(([category, items]): [string, string[]] => [category, asStringList(items)])
      : []
  );

const CATEGORY_HINTS = asCategoryMap(phaseIngredientsData?.categoryHints);

const phaseIngredientsFor = (phase: FunctionalPhase): Map<string, string[]> => {
  const raw: unknown = phaseIngredientsData?.phaseIngredients;
  if (!raw || typeof raw !== "object") return new Map();
  const entry = Object.entries(raw).find(([key]) => key === phase);
  return asCategoryMap(entry ? entry[1] : undefined);
};

export const categorizeIngredient = (name: string): ShoppingCategory => {
  const words = name.toLowerCase().split(/\s+/);
  const match = SHOPPING_CATEGORIES.find((category) =>
    (CATEGORY_HINTS.get(category) ?? []).some((hint) => words.some((word) => word === hint || word === `${hint}s`))
  );
  return match ?? "others";
};

const sortedUnique = (items: Iterable<string>) => Array.from(new Set(items)).sort();

/** Categorized list of the cleaned ingredient names across recipes. */
export const buildShoppingList = (recipes: Recipe[]): ShoppingList => {
  const names = sortedUnique(recipes.flatMap((recipe) => recipe.ingredients.map(cleanIngredientName)).filter(Boolean));

  const categories: Partial<Record<string, string[]>> = {};
  const basics: string[] = [];
  names.forEach((name) => {
    if (isBasicIngredient(name)) {
      basics.push(name);
      return;
    }
    const category = categorizeIngredient(name);
    (categories[category] ||= []).push(name);
  });

  return { categories, basics };
};

/** Union of the recommended ingredients of the given phases, by category. */
export const getPhaseIngredientList = (phases: FunctionalPhase[]): ShoppingList => {
  const categories: Partial<Record<string, string[]>> = {};
  new Set(phases).forEach((phase) => {
    phaseIngredientsFor(phase).forEach((items, category) => {
      categories[category] = sortedUnique([...(categories[category] ?? []), ...items]);
    });
  });
  return { categories, basics: [] };
};

export const formatShoppingList = ({ categories, basics }: ShoppingList): string => {
  const known = [...PHASE_CATEGORY_ORDER, ...SHOPPING_CATEGORIES];
  const order = [
    ...PHASE_CATEGORY_ORDER,
    ...SHOPPING_CATEGORIES.filter((category) => !PHASE_CATEGORY_ORDER.includes(category)),
    ...Object.keys(categories).filter((category) => !known.includes(category)).sort(),
  ];

  const lines = ["🛒 Shopping List"];
  order.forEach((category) => {
    const items = categories[category];
    if (!items?.length) return;
    lines.push("", `${CATEGORY_ICONS[category] ?? "•"} ${titleCase(category)}:`, ...items.map((item) => `  • ${item}`));
  });

  if (basics.length) {
    lines.push(
      "",
      "🏠 Pantry Items to Check:",
      "(These basic ingredients are assumed to be in most kitchens)",
      ...basics.map((item) => `  • ${item}`)
    );
  }

  return lines.join("\n");
};
