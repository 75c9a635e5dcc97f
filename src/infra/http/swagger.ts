import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Todo API',
      version: '1.0.0',
      description: 'Personal to-do lists with JWT authentication. Every todo is visible only to its owner.',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
        },
      },
      schemas: {
        Todo: {
          type: 'object',
          required: ['id', 'userId', 'title', 'description', 'completed', 'createdAt', 'updatedAt'],
          properties: {
            id: { type: 'integer', example: 1 },
            userId: { type: 'integer', example: 1 },
            title: { type: 'string', example: 'buy milk' },
            description: { type: 'string', example: '' },
            completed: { type: 'boolean', example: false },
            createdAt: { type: 'string', format: 'date-time' },
            updatedAt: { type: 'string', format: 'date-time' },
          },
        },
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'NOT_FOUND',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Todo not found',
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
      { name: 'Auth', description: 'Registration and login' },
      { name: 'Todos', description: 'Owner-scoped todo management' },
      { name: 'Health', description: 'Liveness' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts', './src/infra/http/app.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);
