import { Router } from 'express';
import {
  addOffering,
  createCatalog,
  deleteCatalog,
  evaluateCatalog,
  listOfferings,
  removeOffering,
  updateOffering,
} from '../controllers/catalogController';

const router = Router();

router.post('/', createCatalog);
router.delete('/:id', deleteCatalog);
router.get('/:id/offerings', listOfferings);
router.post('/:id/offerings', addOffering);
router.patch('/:id/offerings/:name/:sectionId', updateOffering);
router.delete('/:id/offerings/:name/:sectionId', removeOffering);
router.post('/:id/schedules', evaluateCatalog);

export default router;
