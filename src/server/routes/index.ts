import { Router, Request, Response } from 'express';
import { SetController } from '../controllers/set.controller';
import { cardDataService } from '../singletons';
import packRoutes from './pack.routes';
import setRoutes from './set.routes';

const router = Router();

router.get('/health', (_req: Request, res: Response) => {
  const sets = cardDataService.isLoaded ? cardDataService.getIndex().size : 0;
  res.json({ status: 'ok', sets });
});

router.use('/sets', setRoutes);
router.use('/packs', packRoutes);
router.post('/data/reload', SetController.reload);

export default router;
