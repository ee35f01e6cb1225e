import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import { describeError, RecipeCatalogError } from "../lib/errors";
import { logger } from "../lib/logger";
import type { FunctionalPhase } from "../planner/phaseModels";
import type { Recipe } from "./query";

export interface RecipeCatalog {
  getRecipes(phase: FunctionalPhase): Promise<Recipe[]>;
}

const recipeFileSchema = z.object({
  title: z.string().trim().min(1),
  prepTime: z.number().int().nonnegative().default(0),
  tags: z.array(z.string()).default([]),
  ingredients: z.array(z.string()).min(1),
  instructions: z.array(z.string()).default([]),
  notes: z.string().optional(),
  url: z.string().url().optional(),
});

const SKIPPED_FILE_PREFIXES = ["_", "TEMPLATE"];

export const parseRecipeFile = (
  content: string,
  filePath: string,
  phase: FunctionalPhase
): { ok: true; recipe: Recipe } | { ok: false; reason: string } => {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    return { ok: false, reason: `invalid JSON: ${describeError(error).error}` };
  }

  const parsed = recipeFileSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      reason: parsed.error.issues.map((issue) => `${issue.path.join(".") || "recipe"}: ${issue.message}`).join("; "),
    };
  }

  return {
    ok: true,
    recipe: {
      id: path.basename(filePath, path.extname(filePath)),
      phase,
      filePath,
      ...parsed.data,
      tags: parsed.data.tags.map((tag) => tag.toLowerCase().trim()),
    },
  };
};

/**
 * Reads `<rootDir>/<phase>/*.json`, one recipe per file. Files that fail to
 * parse are skipped with a warning; a missing phase directory fails the load.
 */
export const createFileRecipeCatalog = (rootDir: string): RecipeCatalog => ({
  getRecipes: async (phase) => {
    const phaseDir = path.join(rootDir, phase);

    let fileNames: string[];
    try {
      fileNames = await fs.readdir(phaseDir);
    } catch (error) {
      throw new RecipeCatalogError(`Recipe directory not readable: ${phaseDir}`, { cause: error });
    }

    const recipeFiles = fileNames
      .filter((name) => name.endsWith(".json"))
      .filter((name) => !SKIPPED_FILE_PREFIXES.some((prefix) => name.startsWith(prefix)))
      .sort();

    const recipes: Recipe[] = [];
    for (const fileName of recipeFiles) {
      const filePath = path.join(phaseDir, fileName);
      let content: string;
      try {
        content = await fs.readFile(filePath, "utf-8");
      } catch (error) {
        logger.warn("LOG.RECIPE_SKIPPED", { filePath, ...describeError(error) }, { phase });
        continue;
      }

      const result = parseRecipeFile(content, filePath, phase);
      if (!result.ok) {
        logger.warn("LOG.RECIPE_SKIPPED", { filePath, reason: result.reason }, { phase });
        continue;
      }
      recipes.push(result.recipe);
    }

    logger.info("LOG.RECIPES_LOADED", { count: recipes.length, skipped: recipeFiles.length - recipes.length }, { phase });
    return recipes;
  },
});

export const createInMemoryRecipeCatalog = (
  recipesByPhase: Partial<Record<FunctionalPhase, Recipe[]>>
): RecipeCatalog => ({
  getRecipes: async (phase) => [...(recipesByPhase[phase] ?? [])],
});
