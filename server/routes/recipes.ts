import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { authenticate } from '../plugins/auth.plugin';
import { recipeService } from '../services/recipe.service';
import { idParams, ok, pageQuery, recipeItems } from './schemas';

const createRecipeBody = z.object({
  final_product_id: z.string().trim().min(1),
  name: z.string().trim().max(200).optional(),
  items: recipeItems,
});

const updateRecipeBody = z.object({
  name: z.string().trim().max(200).optional(),
  items: recipeItems.optional(),
});

export async function recipeRoutes(server: FastifyInstance) {
  server.get('/recipes', { preHandler: [authenticate] }, async (request) => {
    const result = await recipeService.listRecipes(pageQuery.parse(request.query));
    return { success: true, ...result };
  });

  server.get('/recipes/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await recipeService.getRecipe(id));
  });

  server.post('/recipes', { preHandler: [authenticate] }, async (request, reply) => {
    const recipe = await recipeService.createRecipe(createRecipeBody.parse(request.body));
    return reply.code(201).send(ok(recipe));
  });

  server.put('/recipes/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await recipeService.updateRecipe(id, updateRecipeBody.parse(request.body)));
  });

  server.delete('/recipes/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    return ok(await recipeService.deleteRecipe(id));
  });
}
