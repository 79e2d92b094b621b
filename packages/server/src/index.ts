// Export all handlers for Lambda
export { handler as viewerRequestHandler } from './edge/viewer-request.js';
export { handler as pingHandler } from './handlers/ping.js';
