import { BadRequestError } from '@app/apiError';
import { RequestHandler } from 'express';
import Joi from 'joi';

/**
 * Validates and normalizes one part of the request against a Joi schema.
 */
const validate = (schema: Joi.ObjectSchema, validationSelector: 'body' | 'params' | 'query' = 'body'): RequestHandler => {
    return (req, _res, next) => {
        const { value, error } = schema.validate(req[validationSelector], { abortEarly: false });
        if (error) {
            throw new BadRequestError(error.message, {
                details: { fields: error.details.map((detail) => detail.path.join('.')) },
            });
        }
        req[validationSelector] = value;
        next();
    };
};

export default validate;
