import Joi from 'joi';
import { PHONE_REGEX } from '@app/services/sms.service';

const LoginRequestSchema = Joi.object({
    phone: Joi.string().trim().regex(PHONE_REGEX).required(),
    pin: Joi.string().required(),
});

export { LoginRequestSchema };
