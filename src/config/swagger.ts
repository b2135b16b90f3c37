// src/config/swagger.ts
import swaggerJSDoc from "swagger-jsdoc";

/**
 * OpenAPI document for the `@openapi` blocks in the routers. The relative
 * server works for whatever host serves the docs; a configured public URL is
 * listed as well.
 */
export function buildSwaggerSpec(publicBaseUrl?: string): object {
  const options: swaggerJSDoc.Options = {
    definition: {
      openapi: "3.0.0",
      info: {
        title: "Quiz API",
        version: "1.0.0",
        description: "Questionarios, questoes and respostas: CSV import, practice and exams (MongoDB + Node.js)",
      },
      servers: [
        { url: "/api/v1", description: "This server" },
        ...(publicBaseUrl ? [{ url: `${publicBaseUrl.replace(/\/+$/, "")}/api/v1`, description: "Public" }] : []),
      ],
    },
    apis: ["./src/routes/*.ts"],
  };

  return swaggerJSDoc(options);
}
