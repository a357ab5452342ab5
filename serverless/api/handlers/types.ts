import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';

// The parts of an API Gateway event the handlers read
export type HandlerEvent = Pick<APIGatewayProxyEvent, 'body' | 'pathParameters' | 'queryStringParameters'>;

export type HandlerContext = Pick<Context, 'getRemainingTimeInMillis'>;

export type Handler = (event: HandlerEvent, context?: HandlerContext) => Promise<APIGatewayProxyResult>;
