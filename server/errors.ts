/**
 * Error types shared by the sync services and the HTTP clients.
 * Routes read `statusCode` off any thrown error to pick the response status.
 */

export class SyncError extends Error {
  constructor(
    message: string,
    public statusCode: number = 400,
  ) {
    super(message);
    this.name = "SyncError";
  }
}

/** Non-2xx response, timeout or network failure from ERP, storefront or ATUM. */
export class ExternalApiError extends Error {
  constructor(
    public service: "erp" | "storefront" | "atum",
    message: string,
    public status?: number,
    public body?: string,
  ) {
    super(message);
    this.name = "ExternalApiError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
