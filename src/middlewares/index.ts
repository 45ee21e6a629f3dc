import errorHandler from '@app/middlewares/errorHandler';
import notFoundErrorHandler from '@app/middlewares/notFoundError';
import validate from '@app/middlewares/validator';
import { errorLogger, responseCapture, routeLogger } from './morgan';

export { errorHandler, notFoundErrorHandler, validate, routeLogger, errorLogger, responseCapture };
