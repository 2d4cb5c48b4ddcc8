/**
 * Request Validation Middleware
 *
 * express-validator chains for the job routes. Multipart bodies are parsed by
 * multer before these run, so form fields are available on req.body.
 */

import { Request, Response, NextFunction } from 'express';
import { body, query, validationResult, ValidationChain } from 'express-validator';
import { ErrorFactory } from '@pageline/errors';
import { MAX_DPI, MIN_DPI } from '../config';
import { JobStatus, LAYOUT_MODES } from '../models/job.model';
import { logger } from '../utils/logger';

/**
 * Turns validation failures into an InvalidInputError for the error handler
 */
export const validateRequest = (req: Request, _res: Response, next: NextFunction): void => {
  const errors = validationResult(req);

  if (errors.isEmpty()) {
    next();
    return;
  }

  const details = errors.array().map((err) => ({
    field: err.type === 'field' ? err.path : 'unknown',
    message: String(err.msg),
  }));

  logger.warn('Request validation failed', { path: req.path, details });
  next(ErrorFactory.invalidInput(details[0].message, { details }));
};

const credentialRules: ValidationChain[] = [
  body('api_key')
    .isString()
    .withMessage('api_key is required')
    .trim()
    .notEmpty()
    .withMessage('api_key is required'),

  body('secret_key')
    .isString()
    .withMessage('secret_key is required')
    .trim()
    .notEmpty()
    .withMessage('secret_key is required'),
];

const layoutRule: ValidationChain = body('layout')
  .optional()
  .trim()
  .isIn([...LAYOUT_MODES])
  .withMessage(`layout must be one of ${LAYOUT_MODES.join(', ')}`);

/**
 * Validation rules for POST /jobs (multipart form)
 */
export const validateStartJob: ValidationChain[] = [
  body('input_mode')
    .optional()
    .trim()
    .isIn(['pdf', 'images'])
    .withMessage('input_mode must be pdf or images'),

  ...credentialRules,

  layoutRule,

  // passed through to the recognizer as is; empty means the default
  body('language_type')
    .optional({ values: 'falsy' })
    .trim()
    .isLength({ min: 1, max: 32 })
    .withMessage('language_type must be between 1 and 32 characters')
    .not()
    .matches(/[\u0000-\u001f\u007f]/)
    .withMessage('language_type cannot contain control characters'),

  body('dpi')
    .optional({ values: 'falsy' })
    .trim()
    .isInt({ min: MIN_DPI, max: MAX_DPI })
    .withMessage(`dpi must be an integer between ${MIN_DPI} and ${MAX_DPI}`)
    .toInt(),
];

/**
 * Validation rules for POST /jobs/:id/retry
 */
export const validateRetryJob: ValidationChain[] = [...credentialRules, layoutRule];

/**
 * Validation rules for GET /jobs
 */
export const validateListJobs: ValidationChain[] = [
  query('status')
    .optional()
    .isIn(Object.values(JobStatus))
    .withMessage(`status must be one of ${Object.values(JobStatus).join(', ')}`),

  query('limit')
    .optional()
    .isInt({ min: 1, max: 1000 })
    .withMessage('limit must be between 1 and 1000')
    .toInt(),
];
