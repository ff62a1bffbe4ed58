/**
 * Endpoint summary served at / and /api
 */
export const API_INFO = {
  message: "Cashflow Projection API",
  version: "1.0.0",
  endpoints: {
    projection: "POST /api/projection",
    assets: "POST /api/assets",
    mortgage: "POST /api/mortgage",
    validate: "POST /api/validate",
    health: "GET /api/health",
  },
} as const;
