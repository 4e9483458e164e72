export { createApp, type AppDependencies } from './app';
export { AppError, errorHandler, asyncHandler, type ErrorBody, type ErrorCode } from './errors';
