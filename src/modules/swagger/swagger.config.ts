import { DocumentBuilder, OpenAPIObject, SwaggerCustomOptions } from '@nestjs/swagger';

/**
 * OpenAPI configuration, served by main.ts at /api/docs.
 */
export function buildSwaggerConfig(): Omit<OpenAPIObject, 'paths'> {
  return new DocumentBuilder()
    .setTitle('Club Membership API')
    .setDescription(
      'Member registration, staff approval and notifications for the ICT club. ' +
        'Authenticated endpoints require a JWT Bearer token obtained from POST /api/auth/login.',
    )
    .setVersion('1.0.0')
    .addBearerAuth(
      {
        type: 'http',
        scheme: 'bearer',
        bearerFormat: 'JWT',
        description: 'Enter your JWT access token from /api/auth/login',
      },
      'JWT-auth',
    )
    .addTag('Authentication', 'Login with registration number or email')
    .addTag('Members', 'Registration, profile, picture upload and staff review')
    .addTag('Reference Data', 'Departments and courses offered at registration')
    .addTag('Content', 'Projects, events and announcements on the public site')
    .addTag('Contact', 'Messages from visitors to the club administrators')
    .addTag('Health', 'Liveness and readiness probes')
    .build();
}

export const swaggerCustomOptions: SwaggerCustomOptions = {
  swaggerOptions: {
    persistAuthorization: true,
    tagsSorter: 'alpha',
    operationsSorter: 'method',
    docExpansion: 'none',
  },
  customSiteTitle: 'Club Membership API Documentation',
};
