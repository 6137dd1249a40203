import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'BankStack API',
      version: '1.0.0',
      description: 'Login and account services for the BankStack banking demo',
    },
    servers: [
      {
        url: 'http://localhost:8000',
        description: 'Login service',
      },
      {
        url: 'http://localhost:8001',
        description: 'Account service',
      },
    ],
    components: {
      securitySchemes: {
        cookieAuth: {
          type: 'apiKey',
          in: 'cookie',
          name: 'access_token',
        },
      },
      schemas: {
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'INVALID_CREDENTIALS',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Invalid email or password',
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
      },
    },
    tags: [
      { name: 'Auth', description: 'Registration, login and session pages' },
      { name: 'Account', description: 'Account service pages' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export function buildSwaggerSpec(): object {
  return swaggerJsdoc(options);
}
