export { errorHandler } from './errorHandler';
export { notFound } from './notFound';
export { requestLogger } from './requestLogger';
export { validateRequest, commonSchemas } from './validateRequest';
export { multipartUpload, rawUpload, getUploadedFile } from './upload';
