import { RequestHandler, Router } from 'express';
import { z } from 'zod';
import { RegisterUseCase } from '../../../application/auth/register.js';
import { LoginUseCase } from '../../../application/auth/login.js';
import { TokenSettings } from '../../../application/auth/token.js';
import { MAX_PASSWORD_LENGTH, MIN_PASSWORD_LENGTH } from '../../../domain/auth/password.js';
import { UserRepo } from '../../db/userRepo.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, password]
 *             properties:
 *               username: { type: string, minLength: 3, maxLength: 50, example: alice }
 *               password: { type: string, minLength: 3, maxLength: 128 }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 userId: { type: integer }
 *                 username: { type: string }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Username already exists
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive a bearer token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, password]
 *             properties:
 *               username: { type: string }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 token: { type: string }
 *                 tokenType: { type: string, example: Bearer }
 *                 expiresIn: { type: integer, description: Token lifetime in seconds }
 *                 userId: { type: integer }
 *                 username: { type: string }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       429:
 *         description: Too many login attempts
 */

const registerBodySchema = z.object({
  username: z.string().trim().min(3).max(50),
  password: z.string().min(MIN_PASSWORD_LENGTH).max(MAX_PASSWORD_LENGTH),
});

const loginBodySchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});

export interface AuthRoutesDeps {
  userRepo: UserRepo;
  tokenSettings: TokenSettings;
  loginRateLimiter: RequestHandler;
}

export function createAuthRoutes(deps: AuthRoutesDeps) {
  const router = Router();
  const registerUseCase = new RegisterUseCase(deps.userRepo);
  const loginUseCase = new LoginUseCase(deps.userRepo, deps.tokenSettings);

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const result = await registerUseCase.execute(body);
      res.status(201).json(result);
    })
  );

  router.post(
    '/login',
    deps.loginRateLimiter,
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await loginUseCase.execute(body);
      res.status(200).json(result);
    })
  );

  return router;
}
