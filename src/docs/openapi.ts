import { OpenAPIV3 } from 'openapi-types';

const idPath = (name: string): OpenAPIV3.ParameterObject => ({
  name,
  in: 'path',
  required: true,
  schema: { type: 'string' }
});

const pagingParams: OpenAPIV3.ParameterObject[] = [
  { name: 'skip', in: 'query', schema: { type: 'integer', minimum: 0, default: 0 } },
  { name: 'limit', in: 'query', schema: { type: 'integer', minimum: 0, maximum: 1000, default: 100 } }
];

const borrowListParams: OpenAPIV3.ParameterObject[] = [
  ...pagingParams,
  { name: 'activeOnly', in: 'query', schema: { type: 'boolean', default: false } },
  { name: 'bookId', in: 'query', schema: { type: 'string' } },
  {
    name: 'sort',
    in: 'query',
    description: '`borrowedAt` or `returnedAt`; prefix with `-` for descending.',
    schema: { type: 'string', default: '-borrowedAt' }
  }
];

const json = (ref: string): { 'application/json': OpenAPIV3.MediaTypeObject } => ({
  'application/json': { schema: { $ref: `#/components/schemas/${ref}` } }
});

/**
 * OpenAPI specification for the library lending API.
 */
export const openApiSpec: OpenAPIV3.Document = {
  openapi: '3.0.1',
  info: {
    title: 'Library Lending API',
    version: '1.0.0',
    description: 'Catalog, borrowing and fine-grained permissions for a lending library.'
  },
  servers: [
    {
      url: 'http://localhost:3000',
      description: 'Local'
    }
  ],
  components: {
    securitySchemes: {
      bearerAuth: {
        type: 'http',
        scheme: 'bearer',
        bearerFormat: 'JWT'
      }
    },
    schemas: {
      Credentials: {
        type: 'object',
        properties: {
          email: { type: 'string', format: 'email' },
          password: { type: 'string', minLength: 8, maxLength: 40 },
          fullName: { type: 'string' }
        },
        required: ['email', 'password']
      },
      BookInput: {
        type: 'object',
        properties: {
          isbn: { type: 'string', description: 'ISBN-10 or ISBN-13; hyphens and spaces are stripped.' },
          title: { type: 'string' },
          author: { type: 'string' }
        },
        required: ['isbn', 'title', 'author']
      },
      OverrideInput: {
        type: 'object',
        properties: {
          permission: { type: 'string', example: 'books:create' },
          effect: { type: 'string', enum: ['allow', 'deny'] }
        },
        required: ['permission', 'effect']
      },
      UserInput: {
        type: 'object',
        properties: {
          email: { type: 'string', format: 'email' },
          password: { type: 'string', minLength: 8, maxLength: 40 },
          fullName: { type: 'string', nullable: true },
          role: { type: 'string', enum: ['member', 'librarian'] },
          isSuperuser: { type: 'boolean' },
          isActive: { type: 'boolean' }
        }
      }
    }
  },
  security: [{ bearerAuth: [] }],
  paths: {
    '/health': {
      get: { summary: 'Health check', security: [], responses: { 200: { description: 'Healthy' } } }
    },
    '/auth/signup': {
      post: {
        summary: 'Register member',
        security: [],
        requestBody: { required: true, content: json('Credentials') },
        responses: { 201: { description: 'Registered' }, 409: { description: 'Email taken' } }
      }
    },
    '/auth/login': {
      post: {
        summary: 'Login',
        security: [],
        requestBody: { required: true, content: json('Credentials') },
        responses: { 200: { description: 'Bearer token' }, 401: { description: 'Bad credentials' } }
      }
    },
    '/auth/me': {
      get: { summary: 'Get current user', responses: { 200: { description: 'Profile' } } }
    },
    '/users': {
      get: {
        summary: 'List users (users:read)',
        parameters: [
          ...pagingParams,
          { name: 'search', in: 'query', schema: { type: 'string' } },
          { name: 'role', in: 'query', schema: { type: 'string', enum: ['member', 'librarian'] } },
          { name: 'isActive', in: 'query', schema: { type: 'boolean' } },
          { name: 'sort', in: 'query', schema: { type: 'string', default: 'email' } }
        ],
        responses: { 200: { description: 'Users' } }
      },
      post: {
        summary: 'Create user (superuser)',
        requestBody: { required: true, content: json('UserInput') },
        responses: { 201: { description: 'Created' } }
      }
    },
    '/users/me': {
      patch: {
        summary: 'Update own profile',
        requestBody: { required: true, content: json('UserInput') },
        responses: { 200: { description: 'Updated' } }
      }
    },
    '/users/me/password': {
      patch: {
        summary: 'Change own password',
        requestBody: {
          required: true,
          content: {
            'application/json': {
              schema: {
                type: 'object',
                properties: { currentPassword: { type: 'string' }, newPassword: { type: 'string' } },
                required: ['currentPassword', 'newPassword']
              }
            }
          }
        },
        responses: { 200: { description: 'Password changed' } }
      }
    },
    '/users/{userId}': {
      get: {
        summary: 'Get user (self, users:read or superuser)',
        parameters: [idPath('userId')],
        responses: { 200: { description: 'User' } }
      },
      patch: {
        summary: 'Update user (superuser)',
        parameters: [idPath('userId')],
        requestBody: { required: true, content: json('UserInput') },
        responses: { 200: { description: 'Updated' } }
      }
    },
    '/users/{userId}/permissions': {
      get: {
        summary: 'Permission report (self or superuser)',
        parameters: [idPath('userId')],
        responses: { 200: { description: 'Role defaults, overrides and effective permissions' } }
      }
    },
    '/users/{userId}/permissions/overrides': {
      get: {
        summary: 'List overrides (superuser)',
        parameters: [idPath('userId')],
        responses: { 200: { description: 'Overrides' } }
      },
      post: {
        summary: 'Add override (superuser)',
        parameters: [idPath('userId')],
        requestBody: { required: true, content: json('OverrideInput') },
        responses: { 201: { description: 'Created' }, 400: { description: 'Unknown token' }, 409: { description: 'Duplicate' } }
      }
    },
    '/users/{userId}/permissions/overrides/{overrideId}': {
      delete: {
        summary: 'Remove override (superuser)',
        parameters: [idPath('userId'), idPath('overrideId')],
        responses: { 200: { description: 'Removed' } }
      }
    },
    '/books': {
      get: {
        summary: 'List books (books:read)',
        parameters: [
          ...pagingParams,
          { name: 'search', in: 'query', schema: { type: 'string' } },
          { name: 'isbn', in: 'query', schema: { type: 'string' } },
          { name: 'availableOnly', in: 'query', schema: { type: 'boolean', default: false } },
          { name: 'sort', in: 'query', schema: { type: 'string', default: 'title' } }
        ],
        responses: { 200: { description: 'Books' } }
      },
      post: {
        summary: 'Register book copy (books:create)',
        requestBody: { required: true, content: json('BookInput') },
        responses: { 201: { description: 'Created' }, 409: { description: 'ISBN registered with another title or author' } }
      }
    },
    '/books/{bookId}': {
      get: {
        summary: 'Get book (books:read)',
        parameters: [idPath('bookId')],
        responses: { 200: { description: 'Book' } }
      },
      patch: {
        summary: 'Update book (books:update)',
        parameters: [idPath('bookId')],
        requestBody: { required: true, content: json('BookInput') },
        responses: { 200: { description: 'Updated' } }
      },
      delete: {
        summary: 'Delete book (books:delete)',
        parameters: [idPath('bookId')],
        responses: { 200: { description: 'Deleted' }, 409: { description: 'Borrowed or has history' } }
      }
    },
    '/borrows': {
      get: {
        summary: 'List all borrow records (borrows:read_all)',
        parameters: [...borrowListParams, { name: 'borrowerId', in: 'query', schema: { type: 'string' } }],
        responses: { 200: { description: 'Borrow records' } }
      },
      post: {
        summary: 'Borrow a copy (borrows:create)',
        requestBody: {
          required: true,
          content: {
            'application/json': {
              schema: { type: 'object', properties: { bookId: { type: 'string' } }, required: ['bookId'] }
            }
          }
        },
        responses: { 201: { description: 'Borrowed' }, 409: { description: 'Not available' } }
      }
    },
    '/borrows/me': {
      get: {
        summary: 'List own borrow records (borrows:read)',
        parameters: borrowListParams,
        responses: { 200: { description: 'Borrow records' } }
      }
    },
    '/borrows/{borrowId}': {
      get: {
        summary: 'Get borrow record',
        parameters: [idPath('borrowId')],
        responses: { 200: { description: 'Borrow record' } }
      }
    },
    '/borrows/{borrowId}/return': {
      post: {
        summary: 'Return a copy (borrows:return, own records only)',
        parameters: [idPath('borrowId')],
        responses: { 200: { description: 'Returned' }, 409: { description: 'Already returned' } }
      }
    }
  }
};
