import swaggerJsdoc from 'swagger-jsdoc';
import { env } from '../config/environment';

/**
 * Swagger/OpenAPI Configuration
 *
 * Generates OpenAPI 3.0 specification from JSDoc comments in route files
 */
const buildOptions = (leaseDurationSeconds: number): swaggerJsdoc.Options => ({
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Label Queue API',
      version: '1.0.0',
      description: `
Hands out images from a shared queue to concurrent labelling clients.

## Leases
- \`GET /v1/queue/next\` reserves one item and returns a lease token
- The token is required to submit labels, skip, or release the item
- A lease lasts ${leaseDurationSeconds} seconds; an abandoned item becomes available again once it lapses
- A 409 on submit/skip means the lease is gone: drop the item and call next again

## Item lifecycle
1. **PENDING**: waiting to be handed out
2. **RESERVED**: leased to one client
3. **DONE**: labelled or skipped (permanent)
      `.trim(),
    },
    servers: [
      {
        url: `http://localhost:${env.PORT}`,
        description: env.NODE_ENV === 'production' ? 'Production server' : 'Development server',
      },
    ],
    tags: [
      { name: 'Queue', description: 'Lease, submit, skip and progress' },
      { name: 'Items', description: 'Item records' },
      { name: 'Catalog', description: 'Taxonomy and image files' },
      { name: 'Maintenance', description: 'Reservation housekeeping' },
    ],
    components: {
      schemas: {
        LeaseReference: {
          type: 'object',
          required: ['item_id', 'token'],
          properties: {
            item_id: { type: 'integer', description: 'Reserved item id' },
            token: { type: 'string', description: 'Lease token returned by next' },
          },
        },
        ItemView: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            name: { type: 'string', description: 'Image file name' },
            reference: { type: 'string', description: 'URL of the image' },
          },
        },
        Error: {
          type: 'object',
          properties: {
            error: {
              type: 'object',
              properties: {
                code: { type: 'string', description: 'Error code' },
                message: { type: 'string', description: 'Human-readable error message' },
                details: { type: 'object', description: 'Additional error details' },
              },
            },
          },
        },
      },
    },
  },
  apis: ['./src/routes/**/*.ts'], // Path to route files with JSDoc comments
});

/**
 * OpenAPI document for a server handing out leases of `leaseDurationSeconds`
 */
export const buildSwaggerSpec = (leaseDurationSeconds: number): object =>
  swaggerJsdoc(buildOptions(leaseDurationSeconds));
