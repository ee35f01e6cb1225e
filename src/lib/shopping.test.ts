import { describe, expect, it } from "vitest";
import { eggMuffins, salmonBowl } from "../planner/__fixtures__/recipes";
import { buildShoppingList, categorizeIngredient, formatShoppingList, getPhaseIngredientList } from "./shopping";

describe("categorizeIngredient", () => {
  it.each([
    { name: "eggs", category: "proteins" },
    { name: "red peppers", category: "vegetables" },
    { name: "mixed berries", category: "fruits" },
    { name: "brown rice", category: "pantry" },
    { name: "chickpeas", category: "others" },
  ])("files $name under $category", ({ name, category }) => {
    expect(categorizeIngredient(name)).toBe(category);
  });
});

describe("buildShoppingList", () => {
  const list = buildShoppingList([
    { ...eggMuffins, ingredients: [...eggMuffins.ingredients, "salt to taste"] },
    salmonBowl,
  ]);

  it("groups cleaned names and splits out basics", () => {
    expect(list).toEqual({
      categories: { proteins: ["eggs", "salmon"], vegetables: ["broccoli", "spinach"] },
      basics: ["olive oil", "salt"],
    });
  });

  it("formats categories before the pantry check", () => {
    expect(formatShoppingList(list)).toBe(
      [
        "🛒 Shopping List",
        "",
        "🥩 Proteins:",
        "  • eggs",
        "  • salmon",
        "",
        "🥬 Vegetables:",
        "  • broccoli",
        "  • spinach",
        "",
        "🏠 Pantry Items to Check:",
        "(These basic ingredients are assumed to be in most kitchens)",
        "  • olive oil",
        "  • salt",
      ].join("\n")
    );
  });
});

describe("getPhaseIngredientList", () => {
  it("merges the categories of every phase given", () => {
    const { categories } = getPhaseIngredientList(["power", "manifestation"]);
    expect(categories.fruits).toEqual([
      "blueberries",
      "grapefruit",
      "mango",
      "mixed berries",
      "papaya",
      "pineapple",
      "strawberries",
    ]);
    expect(categories.carbohydrates).toBeUndefined();
  });
});
