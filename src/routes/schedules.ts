import { Router } from 'express';
import { evaluateSchedules } from '../controllers/scheduleController';

const router = Router();

router.post('/', evaluateSchedules);

export default router;
