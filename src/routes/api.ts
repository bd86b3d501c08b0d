import { Router, Request, Response } from 'express';
import { deriveConfig, parseConfigOverrides } from '../config.js';
import { convert, getSupportedFormats, validateOnly } from '../converter.js';
import { CriticalValidationError, SizeLimitExceeded, isConverterError } from '../errors.js';
import { reportToJson } from '../validation.js';
import type { ConverterConfig } from '../config.js';

/**
 * Body shared by the convert and validate endpoints
 */
interface ScenarioRequest {
  text: string;
  /** snake_case config overrides */
  options: unknown;
  includeValidationReport: boolean;
  documentPath: string;
}

function readScenarioRequest(body: unknown): ScenarioRequest | null {
  if (typeof body !== 'object' || body === null || !('text' in body) || typeof body.text !== 'string') {
    return null;
  }
  return {
    text: body.text,
    options: 'options' in body ? body.options : undefined,
    includeValidationReport: 'includeValidationReport' in body && body.includeValidationReport === true,
    documentPath: 'documentPath' in body && typeof body.documentPath === 'string' ? body.documentPath : 'request'
  };
}

/**
 * Send an error as JSON with the status code its class carries
 */
export function sendError(res: Response, error: unknown): void {
  if (isConverterError(error)) {
    const body: Record<string, unknown> = { error: error.name, message: error.message };
    if (error instanceof CriticalValidationError) {
      body.report = reportToJson(error.report, 'request', new Date());
    }
    res.status(error.statusCode).json(body);
    return;
  }

  console.error('Request failed', error);
  res.status(500).json({ error: 'InternalError', message: 'Internal server error.' });
}

/**
 * Create API routes for scenario conversion
 */
export function createApiRoutes(baseConfig: ConverterConfig): Router {
  const router = Router();

  // Request config: the server's config with the body's overrides on top
  const requestConfig = (scenario: ScenarioRequest): ConverterConfig => {
    const config = deriveConfig(baseConfig, parseConfigOverrides(scenario.options));
    const size = Buffer.byteLength(scenario.text, 'utf-8');
    if (size > config.maxFileSize) {
      throw new SizeLimitExceeded(`Text is ${size} bytes, over the ${config.maxFileSize} byte limit`, size, config.maxFileSize);
    }
    return config;
  };

  /**
   * GET /api/formats
   * File extensions the converter reads
   */
  router.get('/formats', (_req: Request, res: Response) => {
    res.json({ formats: getSupportedFormats() });
  });

  /**
   * POST /api/convert
   * Body: { text, options?, includeValidationReport? }
   * Responds with the HTML page
   */
  router.post('/convert', (req: Request, res: Response) => {
    const scenario = readScenarioRequest(req.body);
    if (!scenario) {
      res.status(400).json({ error: 'BadRequest', message: 'Payload must include text.' });
      return;
    }

    try {
      const html = convert(scenario.text, requestConfig(scenario), {
        includeValidationReport: scenario.includeValidationReport
      });
      res.type('text/html').send(html);
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/validate
   * Body: { text, options?, documentPath? }
   * Responds with the validation report JSON
   */
  router.post('/validate', (req: Request, res: Response) => {
    const scenario = readScenarioRequest(req.body);
    if (!scenario) {
      res.status(400).json({ error: 'BadRequest', message: 'Payload must include text.' });
      return;
    }

    try {
      const report = validateOnly(scenario.text, requestConfig(scenario));
      res.json(reportToJson(report, scenario.documentPath, new Date()));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
