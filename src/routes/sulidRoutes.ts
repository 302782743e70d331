import { Router } from 'express';
import { SulidController } from '../controllers/sulidController';

export const createSulidRoutes = (sulidController: SulidController = new SulidController()): Router => {
  const router = Router();

  // GET /api/sulids - Generate SULIDs (?count=N)
  router.get('/sulids', (req, res) => sulidController.generate(req, res));

  // GET /api/sulids/:id - Decode a SULID into its fields
  router.get('/sulids/:id', (req, res) => sulidController.describe(req, res));

  // GET /api/sulids/:id/next - Get the next SULID in the same millisecond
  router.get('/sulids/:id/next', (req, res) => sulidController.next(req, res));

  // GET /api/generator - Get the configured generator
  router.get('/generator', (req, res) => sulidController.getGeneratorInfo(req, res));

  return router;
};

export default createSulidRoutes;
