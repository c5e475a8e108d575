import express, { type NextFunction, type Request, type Response, type Router } from 'express';
import type { UserRegistryService } from '../services/userRegistry';
import { registerUserSchema } from '../validators/user';

export default function userRoutes(users: UserRegistryService): Router {
  const router: Router = express.Router();

  // POST /api/user/register
  router.post('/register', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = registerUserSchema.parse(req.body);
      const userId = await users.register({
        name: body.name,
        email: body.email,
        deviceId: body.device_id,
        voice: body.voice,
      });
      res.json({ user_id: userId });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
