/**
 * Digest Router
 */

import { Router } from 'express';
import { digestController } from './scraper.controller';

const router = Router();

/**
 * @route   POST /api/digest
 * @desc    Crawl a site and return its budgeted digest
 * @access  Public
 */
router.post('/', digestController.createDigest);

export default router;
