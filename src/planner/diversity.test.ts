import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createInMemoryRecipeCatalog, type RecipeCatalog } from "../data/recipeCatalog";
import { createInMemoryRecipeHistory, type RecipeHistoryStore } from "../data/recipeHistory";
import { RECIPE_DEFAULTS } from "../data/recipeDefaults";
import { RecipeHistoryError } from "../lib/errors";
import { USER_ID } from "./__fixtures__/events";
import { POWER_RECIPES, avocadoToast, chiaPudding, eggMuffins, makeRecipe, salmonBowl } from "./__fixtures__/recipes";
import { createRecipeService, selectDiverseRecipes } from "./diversity";

const NOW = new Date("2024-02-01T12:00:00Z");
const now = () => NOW;

const shownAt = (day: string) => new Date(`${day}T08:00:00Z`);

describe("selectDiverseRecipes", () => {
  const eggsSlow = makeRecipe({ id: "a", title: "A", prepTime: 10, ingredients: ["2 eggs", "1 tbsp olive oil"] });
  const eggsQuick = makeRecipe({ id: "b", title: "B", prepTime: 5, ingredients: ["3 eggs", "spinach"] });
  const oats = makeRecipe({ id: "c", title: "C", prepTime: 7, ingredients: ["1 cup rolled oats"] });
  const salmon = makeRecipe({ id: "d", title: "D", prepTime: 20, ingredients: ["1 tbsp olive oil", "200 g salmon"] });
  const candidates = [eggsSlow, eggsQuick, oats, salmon];

  it("takes the quickest recipe of each key ingredient first", () => {
    expect(selectDiverseRecipes(candidates, 2).map((recipe) => recipe.id)).toEqual(["b", "c"]);
  });

  it("repeats a key ingredient only after every group is used", () => {
    expect(selectDiverseRecipes(candidates, 4).map((recipe) => recipe.id)).toEqual(["b", "c", "d", "a"]);
  });

  it("stops when candidates run out", () => {
    expect(selectDiverseRecipes(candidates, 10)).toHaveLength(4);
    expect(selectDiverseRecipes(candidates, 0)).toEqual([]);
  });
});

describe("createRecipeService", () => {
  let history: RecipeHistoryStore;
  let catalog: RecipeCatalog;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    history = createInMemoryRecipeHistory({ now });
    catalog = createInMemoryRecipeCatalog({ power: POWER_RECIPES });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const record = (recipeId: string, day: string) =>
    history.recordShown({ userId: USER_ID, recipeId, mealType: "breakfast", phase: "power", shownAt: shownAt(day) });

  it("picks diverse recipes for a meal type", async () => {
    const service = createRecipeService({ catalog, history, now });
    const recipes = await service.getRecipesByMealType("power", "breakfast");
    expect(recipes.map((recipe) => recipe.title)).toEqual(["Egg Muffins", "Chia Pudding"]);
  });

  it("prefers recipes not shown recently and backfills with the least recent", async () => {
    await record(eggMuffins.id, "2024-01-25");
    await record(chiaPudding.id, "2024-01-28");

    const service = createRecipeService({ catalog, history, now });
    const recipes = await service.getRecipesByMealType("power", "breakfast", USER_ID);
    expect(recipes.map((recipe) => recipe.id)).toEqual([avocadoToast.id, eggMuffins.id]);
  });

  it("falls back to recently shown recipes instead of returning nothing", async () => {
    await record(eggMuffins.id, "2024-01-25");
    await record(chiaPudding.id, "2024-01-28");
    await record(avocadoToast.id, "2024-01-26");

    const service = createRecipeService({ catalog, history, now });
    const recipes = await service.getRecipesByMealType("power", "breakfast", USER_ID);
    expect(recipes.map((recipe) => recipe.id)).toEqual([eggMuffins.id, avocadoToast.id]);
  });

  it("ignores history older than the rotation window", async () => {
    await record(eggMuffins.id, "2024-01-10");

    const service = createRecipeService({ catalog, history, now });
    const recipes = await service.getRecipesByMealType("power", "breakfast", USER_ID);
    expect(recipes.map((recipe) => recipe.id)).toEqual([eggMuffins.id, chiaPudding.id]);
  });

  it("returns nothing for a meal type without recipes", async () => {
    const service = createRecipeService({ catalog, history, now });
    expect(await service.getRecipesByMealType("power", "snack", USER_ID)).toEqual([]);
    expect(await service.getRecipesByMealType("nurture", "breakfast", USER_ID)).toEqual([]);
  });

  it("builds meals, a shopping preview and records what was shown", async () => {
    const service = createRecipeService({ catalog, history, now });
    const result = await service.getRecipeRecommendations("power", USER_ID);

    expect(result.meals.map((meal) => [meal.mealType, meal.recipes.map((recipe) => recipe.title)])).toEqual([
      ["breakfast", ["Egg Muffins", "Chia Pudding"]],
      ["lunch", ["Salmon Bowl", "Kale Salad"]],
      ["dinner", ["Salmon Bowl"]],
    ]);
    expect(result.shoppingPreview).toEqual([
      "olive oil",
      "eggs",
      "spinach",
      "chia seeds",
      "coconut milk",
      "salmon",
      "broccoli",
      "kale",
    ]);
    expect(result.selected.map((recipe) => recipe.id)).toEqual([
      eggMuffins.id,
      chiaPudding.id,
      salmonBowl.id,
      "kale-salad",
    ]);
    expect(await history.getRecent(USER_ID, new Date(0))).toHaveLength(5);
  });

  it("rotates on the next request", async () => {
    const service = createRecipeService({ catalog, history, now });
    await service.getRecipeRecommendations("power", USER_ID);
    const breakfast = await service.getRecipesByMealType("power", "breakfast", USER_ID);

    expect(breakfast.map((recipe) => recipe.id)).toEqual([avocadoToast.id, eggMuffins.id]);
  });

  it("prefers a fresh recipe over one already picked for an earlier meal", async () => {
    const stew = makeRecipe({ id: "stew", title: "Stew", prepTime: 5, tags: ["lunch", "dinner"], ingredients: ["1 cup lentils"] });
    const omelette = makeRecipe({ id: "omelette", title: "Omelette", prepTime: 10, tags: ["dinner"], ingredients: ["2 eggs"] });
    const service = createRecipeService({
      catalog: createInMemoryRecipeCatalog({ power: [stew, omelette] }),
      config: { ...RECIPE_DEFAULTS, recipesPerMealType: 1 },
      now,
    });

    const result = await service.getRecipeRecommendations("power");
    expect(result.meals.map((meal) => [meal.mealType, meal.recipes.map((recipe) => recipe.id)])).toEqual([
      ["lunch", ["stew"]],
      ["dinner", ["omelette"]],
    ]);
  });

  it("leaves history untouched when recording is off", async () => {
    const service = createRecipeService({ catalog, history, now });
    const result = await service.getRecipeRecommendations("power", USER_ID, { record: false });

    expect(await history.getRecent(USER_ID, new Date(0))).toEqual([]);

    await service.recordRecommendations(USER_ID, "power", result.meals);
    expect(await history.getRecent(USER_ID, new Date(0))).toHaveLength(5);
  });

  it("loads each phase from the catalog once", async () => {
    const getRecipes = vi.fn(catalog.getRecipes);
    const service = createRecipeService({ catalog: { getRecipes }, now });

    await service.getRecipesByMealType("power", "breakfast");
    await service.getRecipesByMealType("power", "lunch");
    expect(getRecipes).toHaveBeenCalledTimes(1);
  });

  it("reports an unreadable history", async () => {
    const broken: RecipeHistoryStore = {
      recordShown: async () => undefined,
      getRecent: async () => {
        throw new Error("store offline");
      },
    };
    const service = createRecipeService({ catalog, history: broken, now });

    await expect(service.getRecipesByMealType("power", "breakfast", USER_ID)).rejects.toBeInstanceOf(RecipeHistoryError);
  });

  it("keeps its recommendations when recording fails", async () => {
    const failing: RecipeHistoryStore = {
      recordShown: async () => {
        throw new Error("write refused");
      },
      getRecent: async () => [],
    };
    const service = createRecipeService({ catalog, history: failing, now });

    const result = await service.getRecipeRecommendations("power", USER_ID);
    expect(result.meals).toHaveLength(3);
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining("LOG.HISTORY_UNAVAILABLE"));
  });
});
