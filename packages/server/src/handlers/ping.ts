import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';

/**
 * The fields the health check echoes. Any of them may be missing when the
 * function is invoked outside API Gateway.
 */
export type PingEvent = Partial<Pick<APIGatewayProxyEvent, 'path' | 'httpMethod'>> & {
  requestContext?: Partial<Pick<APIGatewayProxyEvent['requestContext'], 'requestId'>>;
};

/**
 * API health check (proxy integration). Returns "pong" and echoes basic request info.
 */
export async function handler(event: PingEvent): Promise<APIGatewayProxyResult> {
  return {
    statusCode: 200,
    headers: {
      'content-type': 'application/json; charset=utf-8',
      'cache-control': 'no-store',
    },
    body: JSON.stringify({
      pong: true,
      requestId: event.requestContext?.requestId ?? null,
      path: event.path ?? null,
      httpMethod: event.httpMethod ?? null,
    }),
  };
}
