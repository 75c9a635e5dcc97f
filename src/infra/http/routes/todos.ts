import { Router } from 'express';
import { z } from 'zod';
import { AuthenticateUseCase } from '../../../application/auth/authenticate.js';
import { OperationLog } from '../../../application/operationLog.js';
import { ClearCompletedTodosUseCase } from '../../../application/todos/clearCompleted.js';
import { CreateTodoUseCase } from '../../../application/todos/createTodo.js';
import { DeleteTodoUseCase } from '../../../application/todos/deleteTodo.js';
import { TodoQueries } from '../../../application/todos/queries.js';
import { ToggleTodoUseCase } from '../../../application/todos/toggleTodo.js';
import { UpdateTodoUseCase } from '../../../application/todos/updateTodo.js';
import {
  MAX_DESCRIPTION_LENGTH,
  MAX_TITLE_LENGTH,
  TODO_FILTERS,
} from '../../../domain/todos/todo.js';
import { TodoRepo } from '../../db/todoRepo.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { authMiddleware, requireUser } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';

/**
 * @openapi
 * /todos:
 *   get:
 *     tags: [Todos]
 *     summary: List the caller's todos in creation order
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: query
 *         name: filter
 *         schema: { type: string, enum: [all, pending, completed], default: all }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/Todo' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   post:
 *     tags: [Todos]
 *     summary: Create a todo
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [title]
 *             properties:
 *               title: { type: string, maxLength: 200, example: buy milk }
 *               description: { type: string, maxLength: 2000 }
 *     responses:
 *       201:
 *         description: Created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Todo' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /todos/stats:
 *   get:
 *     tags: [Todos]
 *     summary: Count the caller's todos
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 total: { type: integer }
 *                 completed: { type: integer }
 *                 pending: { type: integer }
 *
 * /todos/completed:
 *   delete:
 *     tags: [Todos]
 *     summary: Delete all of the caller's completed todos
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 deleted: { type: integer }
 *
 * /todos/{id}:
 *   parameters:
 *     - in: path
 *       name: id
 *       required: true
 *       schema: { type: integer }
 *   get:
 *     tags: [Todos]
 *     summary: Get one todo
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Todo' }
 *       404:
 *         description: Not found (or owned by another user)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   put:
 *     tags: [Todos]
 *     summary: Partially update a todo
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             minProperties: 1
 *             properties:
 *               title: { type: string, maxLength: 200 }
 *               description: { type: string, maxLength: 2000 }
 *               completed: { type: boolean }
 *     responses:
 *       200:
 *         description: Updated
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Todo' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: Not found (or owned by another user)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Todos]
 *     summary: Delete a todo
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       204: { description: Deleted }
 *       404:
 *         description: Not found (or owned by another user)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /todos/{id}/toggle:
 *   patch:
 *     tags: [Todos]
 *     summary: Flip the completion flag
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Todo' }
 *       404:
 *         description: Not found (or owned by another user)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const todoParamsSchema = z.object({
  // Decimal digits only, so "0x1" or "1e3" never address a todo
  id: z
    .string()
    .regex(/^\d+$/, 'Id must be a positive integer')
    .transform(Number)
    .pipe(z.number().int().positive().safe()),
});

const listQuerySchema = z.object({
  filter: z.enum(TODO_FILTERS).default('all'),
});

const createTodoBodySchema = z.object({
  // Blank titles are rejected by the domain with INVALID_TITLE
  title: z.string().max(MAX_TITLE_LENGTH),
  description: z.string().max(MAX_DESCRIPTION_LENGTH).optional(),
});

const updateTodoBodySchema = z
  .object({
    title: z.string().max(MAX_TITLE_LENGTH).optional(),
    description: z.string().max(MAX_DESCRIPTION_LENGTH).optional(),
    completed: z.boolean().optional(),
  })
  .strict();

export interface TodoRoutesDeps {
  todoRepo: TodoRepo;
  operationLog: OperationLog;
  authenticate: AuthenticateUseCase;
}

export function createTodoRoutes(deps: TodoRoutesDeps) {
  const router = Router();
  const { todoRepo, operationLog } = deps;

  const createTodoUseCase = new CreateTodoUseCase(todoRepo, operationLog);
  const updateTodoUseCase = new UpdateTodoUseCase(todoRepo, operationLog);
  const toggleTodoUseCase = new ToggleTodoUseCase(todoRepo, operationLog);
  const deleteTodoUseCase = new DeleteTodoUseCase(todoRepo, operationLog);
  const clearCompletedUseCase = new ClearCompletedTodosUseCase(todoRepo, operationLog);
  const queries = new TodoQueries(todoRepo);

  // All routes require authentication
  router.use(authMiddleware(deps.authenticate));

  router.get('/', validate({ query: listQuerySchema }), (req, res) => {
    const { userId } = requireUser(req);
    const { filter } = listQuerySchema.parse(req.query);
    res.json(queries.list(userId, filter));
  });

  router.get('/stats', (req, res) => {
    const { userId } = requireUser(req);
    res.json(queries.stats(userId));
  });

  router.post(
    '/',
    validate({ body: createTodoBodySchema }),
    asyncHandler(async (req, res) => {
      const { userId } = requireUser(req);
      const body = createTodoBodySchema.parse(req.body);
      const todo = await createTodoUseCase.execute({
        userId,
        title: body.title,
        description: body.description,
      });
      res.status(201).json(todo);
    })
  );

  // Registered before /:id so "completed" is not read as an id
  router.delete(
    '/completed',
    asyncHandler(async (req, res) => {
      const { userId } = requireUser(req);
      const result = await clearCompletedUseCase.execute({ userId });
      res.json(result);
    })
  );

  router.get('/:id', validate({ params: todoParamsSchema }), (req, res) => {
    const { userId } = requireUser(req);
    const { id } = todoParamsSchema.parse(req.params);
    res.json(queries.get(userId, id));
  });

  router.put(
    '/:id',
    validate({ params: todoParamsSchema, body: updateTodoBodySchema }),
    asyncHandler(async (req, res) => {
      const { userId } = requireUser(req);
      const { id } = todoParamsSchema.parse(req.params);
      const changes = updateTodoBodySchema.parse(req.body);
      const todo = await updateTodoUseCase.execute({ userId, todoId: id, changes });
      res.json(todo);
    })
  );

  router.patch(
    '/:id/toggle',
    validate({ params: todoParamsSchema }),
    asyncHandler(async (req, res) => {
      const { userId } = requireUser(req);
      const { id } = todoParamsSchema.parse(req.params);
      const todo = await toggleTodoUseCase.execute({ userId, todoId: id });
      res.json(todo);
    })
  );

  router.delete(
    '/:id',
    validate({ params: todoParamsSchema }),
    asyncHandler(async (req, res) => {
      const { userId } = requireUser(req);
      const { id } = todoParamsSchema.parse(req.params);
      await deleteTodoUseCase.execute({ userId, todoId: id });
      res.status(204).send();
    })
  );

  return router;
}
