import { Router } from 'express';
import { config } from '../config.js';

const router = Router();

router.get('/health', (_req, res) => {
  res.json({ status: 'healthy', service: config.service.name, version: config.service.version });
});

export default router;
