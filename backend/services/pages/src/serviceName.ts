// backend/services/pages/src/serviceName.ts
export const SERVICE_NAME = "pages" as const;
