import { fileURLToPath } from "url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RecipeCatalogError } from "../lib/errors";
import { createFileRecipeCatalog, parseRecipeFile } from "./recipeCatalog";

const FIXTURE_ROOT = fileURLToPath(new URL("./__fixtures__/recipes", import.meta.url));

describe("parseRecipeFile", () => {
  it("derives the id from the file name and normalizes tags", () => {
    const result = parseRecipeFile(
      JSON.stringify({ title: "Oat Bowl", tags: [" Breakfast "], ingredients: ["1 cup oats"] }),
      "/recipes/nurture/oat-bowl.json",
      "nurture"
    );

    expect(result).toEqual({
      ok: true,
      recipe: {
        id: "oat-bowl",
        phase: "nurture",
        filePath: "/recipes/nurture/oat-bowl.json",
        title: "Oat Bowl",
        prepTime: 0,
        tags: ["breakfast"],
        ingredients: ["1 cup oats"],
        instructions: [],
      },
    });
  });

  it("reports schema problems by field", () => {
    expect(parseRecipeFile('{"ingredients":["1 egg"]}', "/r/x.json", "power")).toEqual({
      ok: false,
      reason: "title: Required",
    });
  });

  it("rejects malformed JSON", () => {
    const result = parseRecipeFile("{", "/r/x.json", "power");
    expect(result.ok).toBe(false);
  });
});

describe("createFileRecipeCatalog", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("loads valid recipe files and skips the rest", async () => {
    const recipes = await createFileRecipeCatalog(FIXTURE_ROOT).getRecipes("power");

    expect(recipes.map((recipe) => recipe.id)).toEqual(["green-smoothie", "salmon-bowl"]);
    expect(recipes[0]).toMatchObject({
      title: "Green Smoothie",
      prepTime: 5,
      tags: ["breakfast", "snack"],
      url: "https://example.com/green-smoothie",
    });
    expect(recipes[1]?.notes).toBe("Works with trout too.");
    expect(console.warn).toHaveBeenCalledTimes(2);
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining("LOG.RECIPE_SKIPPED"));
  });

  it("fails when the phase directory is missing", async () => {
    await expect(createFileRecipeCatalog(FIXTURE_ROOT).getRecipes("manifestation")).rejects.toBeInstanceOf(
      RecipeCatalogError
    );
  });
});
