import type { Recipe } from "./query";

export type RecipeCardViewModel = {
  id: string;
  title: string;
  prepTime: number;
  tags: string[];
  url?: string;
  ingredientPreview: string;
};

export const toRecipeCard = (recipe: Recipe): RecipeCardViewModel => ({
  id: recipe.id,
  title: recipe.title,
  prepTime: recipe.prepTime,
  tags: [...recipe.tags],
  url: recipe.url,
  ingredientPreview: recipe.ingredients.slice(0, 3).join(", "),
});
