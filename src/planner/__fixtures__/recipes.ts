import type { Recipe } from "../../data/query";

export const makeRecipe = (overrides: Partial<Recipe> & Pick<Recipe, "id" | "title">): Recipe => ({
  phase: "power",
  prepTime: 10,
  tags: [],
  ingredients: [],
  instructions: [],
  filePath: `/recipes/power/${overrides.id}.json`,
  ...overrides,
});

export const eggMuffins = makeRecipe({
  id: "egg-muffins",
  title: "Egg Muffins",
  prepTime: 15,
  tags: ["breakfast"],
  ingredients: ["3 eggs", "1 cup spinach"],
});

export const chiaPudding = makeRecipe({
  id: "chia-pudding",
  title: "Chia Pudding",
  prepTime: 5,
  tags: ["breakfast"],
  ingredients: ["2 tbsp chia seeds", "1 cup coconut milk"],
});

export const avocadoToast = makeRecipe({
  id: "avocado-toast",
  title: "Avocado Toast",
  prepTime: 10,
  tags: ["breakfast"],
  ingredients: ["1 avocado", "1 slice sourdough bread", "1 tbsp olive oil"],
});

export const salmonBowl = makeRecipe({
  id: "salmon-bowl",
  title: "Salmon Bowl",
  prepTime: 20,
  tags: ["lunch", "dinner"],
  ingredients: ["200 g salmon", "1 cup broccoli", "1 tbsp olive oil"],
});

export const kaleSalad = makeRecipe({
  id: "kale-salad",
  title: "Kale Salad",
  prepTime: 10,
  tags: ["lunch"],
  ingredients: ["2 cups kale", "1 tbsp olive oil", "1 avocado"],
});

export const POWER_RECIPES = [eggMuffins, chiaPudding, avocadoToast, salmonBowl, kaleSalad];
