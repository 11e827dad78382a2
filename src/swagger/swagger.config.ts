import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';
import { env } from '../config/environment';

/**
 * Swagger/OpenAPI Configuration
 *
 * Generates OpenAPI 3.0 specification from JSDoc comments in route files
 */
const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Custody Inventory API',
      version: '1.0.0',
      description: `
Equipment inventory with custody tracking and a request/approval workflow.

## Roles
- **member**: read items and history
- **admin**: check items out and in, submit add/remove requests
- **quartermaster**: everything, including item and user management and request review

## Custody Guarantees
An item is held by at most one person. Checkout and checkin are conditional
updates on the current state, so of two concurrent checkouts exactly one
succeeds; the other receives \`ALREADY_CHECKED_OUT\` naming the holder.
Every successful transition appends one custody history entry.

## Request Lifecycle
1. **pending**: submitted by an admin
2. **approved**: reviewed once; the item is created or removed
3. **denied**: reviewed once, with a reason
      `.trim(),
    },
    servers: [
      {
        url: `http://localhost:${env.PORT}`,
        description: env.NODE_ENV === 'production' ? 'Production server' : 'Development server',
      },
    ],
    tags: [
      { name: 'Auth', description: 'Login and the current account' },
      { name: 'Items', description: 'Inventory item management' },
      { name: 'Custody', description: 'Checkout, checkin and history' },
      { name: 'Requests', description: 'Add/remove item approval workflow' },
      { name: 'Users', description: 'Account management' },
      { name: 'Catalog', description: 'Categories and storage locations' },
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
        Item: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            name: { type: 'string' },
            description: { type: 'string', nullable: true },
            category: { type: 'string', nullable: true },
            barcode: { type: 'string', nullable: true },
            serialNumber: { type: 'string', nullable: true },
            storageLocation: { type: 'string', nullable: true },
            imageUrl: { type: 'string', nullable: true },
            notes: { type: 'string', nullable: true },
            isCheckedOut: { type: 'boolean' },
            checkedOutBy: { type: 'string', nullable: true, description: 'Set exactly when checked out' },
            checkedOutDate: { type: 'string', format: 'date-time', nullable: true },
            createdAt: { type: 'string', format: 'date-time' },
            updatedAt: { type: 'string', format: 'date-time' },
          },
        },
        HistoryEntry: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            itemId: { type: 'integer' },
            action: { type: 'string', enum: ['checkout', 'checkin'] },
            personName: { type: 'string' },
            timestamp: { type: 'string', format: 'date-time' },
            notes: { type: 'string', nullable: true },
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
  apis: [path.join(__dirname, '../routes/**/*.{ts,js}')],
};

export const swaggerSpec = swaggerJsdoc(options);
