/**
 * HTML calculator page — form on GET, form plus results on POST.
 */
import { Router } from 'express';
import * as service from '../services/emi.js';
import { parseCalculationRequest } from '../services/emi-input.js';
import { renderCalculatorPage, DEFAULT_FORM } from '../views/calculator.js';
import type { CalculatorForm } from '../views/calculator.js';

function readForm(body: Record<string, unknown>): CalculatorForm {
  const field = (name: keyof CalculatorForm): string => {
    const value = body[name];
    return typeof value === 'string' ? value : DEFAULT_FORM[name];
  };
  return {
    calculationType: field('calculationType'),
    principal: field('principal'),
    rate: field('rate'),
    tenure: field('tenure'),
    emi: typeof body.emi === 'string' ? body.emi : '',
  };
}

export function calculatorPageRoutes(): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.type('html').send(renderCalculatorPage({ form: DEFAULT_FORM }));
  });

  router.post('/', (req, res) => {
    const body: Record<string, unknown> = req.body ?? {};
    const form = readForm(body);
    try {
      const result = service.calculateEmiOrTenure(parseCalculationRequest(body));
      res.type('html').send(renderCalculatorPage({ form, result }));
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : 'Unknown error';
      res.status(400).type('html').send(renderCalculatorPage({ form, error: message }));
    }
  });

  return router;
}
