import { subDays } from "date-fns";
import type { FunctionalPhase } from "../planner/phaseModels";
import type { MealType } from "./query";
import { RECIPE_DEFAULTS } from "./recipeDefaults";

export type RecipeHistoryEntry = {
  userId: string;
  recipeId: string;
  mealType: MealType;
  phase: FunctionalPhase;
  shownAt: Date;
};

export interface RecipeHistoryStore {
  recordShown(entry: RecipeHistoryEntry): Promise<void>;
  /** Entries for the user shown at or after `since`, newest first. */
  getRecent(userId: string, since: Date): Promise<RecipeHistoryEntry[]>;
}

type InMemoryHistoryOptions = {
  ttlDays?: number;
  now?: () => Date;
};

/**
 * Append-only history kept in process memory. Entries older than the TTL
 * are pruned whenever the store is touched.
 */
export const createInMemoryRecipeHistory = ({
  ttlDays = RECIPE_DEFAULTS.historyTtlDays,
  now = () => new Date(),
}: InMemoryHistoryOptions = {}): RecipeHistoryStore => {
  let entries: RecipeHistoryEntry[] = [];

  const prune = () => {
    const cutoff = subDays(now(), ttlDays).getTime();
    entries = entries.filter((entry) => entry.shownAt.getTime() >= cutoff);
  };

  return {
    recordShown: async (entry) => {
      prune();
      entries.push({ ...entry });
    },
    getRecent: async (userId, since) => {
      prune();
      return entries
        .filter((entry) => entry.userId === userId && entry.shownAt.getTime() >= since.getTime())
        .sort((left, right) => right.shownAt.getTime() - left.shownAt.getTime())
        .map((entry) => ({ ...entry }));
    },
  };
};
