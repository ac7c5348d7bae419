import type { RequestHandler } from 'express';
import Ajv, { ErrorObject } from 'ajv';
import { ValidationError } from '../utils/errors.js';

const ajv = new Ajv({
  allErrors: true,
  strict: false
});

function formatValidationError(error: ErrorObject): string {
  if (error.keyword === 'additionalProperties' && typeof error.params.additionalProperty === 'string') {
    return `unexpected property ${error.params.additionalProperty}`;
  }
  const field = error.instancePath.replace(/^\//, '').replace(/\//g, '.');
  return field ? `${field}: ${error.message}` : `${error.message}`;
}

/** Validates the JSON body against a JSON schema; failures become ValidationError (400). */
export const validateSchema = (schema: object): RequestHandler => {
  const validate = ajv.compile(schema);

  return (req, _res, next) => {
    if (!validate(req.body ?? {})) {
      const errors = validate.errors?.map(formatValidationError) ?? [];
      next(new ValidationError(errors[0] || 'Validation failed'));
      return;
    }
    next();
  };
};
