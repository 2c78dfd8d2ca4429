import { Router } from 'express';
import { SetController } from '../controllers/set.controller';

const router = Router();

router.get('/', SetController.getSets);
router.get('/:code', SetController.getSet);

export default router;
