import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';
import { SALARY_FIELDS } from './tax/salaryFields.js';
import { config } from './config.js';

const salaryComponentProperties = Object.fromEntries(
  SALARY_FIELDS.map(field => [
    field.key,
    { type: 'number', description: field.label, example: 0 }
  ])
);

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Salaried Income Tax Calculator API',
      version: '1.0.0',
      description: `
Computes Pakistani salaried-individual income tax from 16 monthly salary
components and the annual employer provident fund contribution.

## Calculation
- Annual taxable income = (sum of 16 monthly components × 12) + employer PF
- Tax from the six FBR salaried slabs; a boundary amount belongs to the lower slab
- Monthly tax = annual tax ÷ 12

## Rate Limiting
- General API: ${config.RATE_LIMIT_MAX} requests per 15 minutes
- Calculations: ${config.RATE_LIMIT_MAX * 3} per 15 minutes
      `,
      license: {
        name: 'MIT'
      }
    },
    servers: [
      {
        url: `http://localhost:${config.PORT}`,
        description: 'Development server'
      }
    ],
    components: {
      schemas: {
        Error: {
          type: 'object',
          properties: {
            success: { type: 'boolean', example: false },
            error: {
              type: 'string',
              description: 'Error code'
            },
            message: {
              type: 'string',
              description: 'Human-readable error message'
            },
            reference: {
              type: 'string',
              description: 'Error reference ID for support'
            },
            details: {
              type: 'array',
              description: 'Validation error details',
              items: {
                type: 'object',
                properties: {
                  field: { type: 'string' },
                  message: { type: 'string' }
                }
              }
            }
          },
          example: {
            success: false,
            error: 'INVALID_INPUT',
            message: 'Please ensure all fields contain valid numbers.',
            details: [{ field: 'basicSalary', message: 'Expected a number' }]
          }
        },
        SalaryComponents: {
          type: 'object',
          required: SALARY_FIELDS.map(field => field.key),
          properties: salaryComponentProperties
        },
        TaxCalculationResponse: {
          type: 'object',
          properties: {
            success: { type: 'boolean', example: true },
            data: {
              type: 'object',
              properties: {
                calculation: {
                  type: 'object',
                  properties: {
                    monthlyTotal: { type: 'number' },
                    grossAnnualSalary: { type: 'number' },
                    taxableIncome: { type: 'number' },
                    annualTax: { type: 'number' },
                    monthlyTax: { type: 'number' },
                    slab: {
                      type: 'object',
                      properties: {
                        annualTax: { type: 'number' },
                        slab: { type: 'integer', minimum: 1, maximum: 6 },
                        label: { type: 'string' },
                        fixedTax: { type: 'number' },
                        rate: { type: 'number' },
                        exceedingAmount: { type: 'number' },
                        excessAmount: { type: 'number' }
                      }
                    }
                  }
                },
                report: {
                  type: 'object',
                  description: 'Markdown text blocks',
                  properties: {
                    summary: { type: 'string' },
                    steps: { type: 'string' },
                    assistant: { type: 'string' },
                    disclaimer: { type: 'string' }
                  }
                }
              }
            }
          }
        }
      }
    }
  },
  // Route files sit beside this module as .ts (ts-jest, dev) or .js (build)
  apis: [path.join(__dirname, 'routes', '*.{ts,js}')]
};

export const swaggerSpec = swaggerJsdoc(options);
