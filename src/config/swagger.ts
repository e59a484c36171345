// src/config/swagger.ts
import swaggerJSDoc from "swagger-jsdoc";
import type { AppConfig } from "./env";

export function createSwaggerSpec(config: Pick<AppConfig, "port" | "publicBaseUrl">): object {
  const options: swaggerJSDoc.Options = {
    definition: {
      openapi: "3.0.0",
      info: {
        title: "Job Board API",
        version: "1.0.0",
        description:
          "Job board backend: seekers apply, employers post, admins moderate (MongoDB + Node.js)",
      },
      servers: [
        { url: `http://localhost:${config.port}/api/v1`, description: "Local dev" },
        ...(config.publicBaseUrl
          ? [{ url: `${config.publicBaseUrl}/api/v1`, description: "Production" }]
          : []),
      ],
      components: {
        securitySchemes: {
          bearerAuth: { type: "http", scheme: "bearer" },
        },
      },
    },
    // route files carry @openapi JSDoc blocks
    apis: ["./src/routes/*.ts"],
  };

  return swaggerJSDoc(options);
}
