/**
 * EMI and Amortization — Routes
 */
import { Router } from 'express';
import { apiSuccess, apiError } from '../models/shared.js';
import * as service from '../services/emi.js';
import { parseCalculationRequest } from '../services/emi-input.js';

export function emiRoutes(): Router {
  const router = Router();

  // POST /api/emi/calculate — calculate EMI or tenure with its schedule
  router.post('/calculate', (req, res) => {
    try {
      const body: Record<string, unknown> = req.body ?? {};
      const request = parseCalculationRequest(body);
      const result = service.calculateEmiOrTenure(request);
      res.json(apiSuccess(result));
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : 'Unknown error';
      res.status(400).json(apiError(message));
    }
  });

  // GET /api/emi/calculations — recent calculations, newest first
  router.get('/calculations', (_req, res) => {
    res.json(apiSuccess(service.listCalculations()));
  });

  // GET /api/emi/calculations/:id — a single calculation
  router.get('/calculations/:id', (req, res) => {
    const { id } = req.params;
    const result = service.getCalculation(id);
    if (!result) {
      res.status(404).json(apiError(`Calculation not found: ${id}`));
      return;
    }
    res.json(apiSuccess(result));
  });

  return router;
}
