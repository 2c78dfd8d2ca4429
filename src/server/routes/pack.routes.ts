import { Router } from 'express';
import { PackController } from '../controllers/pack.controller';

const router = Router();

router.post('/generate', PackController.generate);
router.post('/sealed', PackController.sealed);
router.post('/chaos', PackController.chaos);

export default router;
