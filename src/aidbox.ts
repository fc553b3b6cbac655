export const AIDBOX_URL = process.env.AIDBOX_URL || "http://localhost:8080";
const CLIENT_ID = process.env.AIDBOX_CLIENT_ID || "root";
const CLIENT_SECRET = process.env.AIDBOX_CLIENT_SECRET || "secret";

const credentials = Buffer.from(`${CLIENT_ID}:${CLIENT_SECRET}`).toString("base64");

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string,
  ) {
    super(`HTTP ${status}: ${body}`);
    this.name = "HttpError";
  }
}

export class NotFoundError extends HttpError {
  constructor(path: string, body: string) {
    super(404, body);
    this.message = `${path} not found: ${body}`;
    this.name = "NotFoundError";
  }
}

export async function aidboxFetch<T = unknown>(path: string, options: RequestInit = {}): Promise<T> {
  const response = await fetch(`${AIDBOX_URL}${path}`, {
    ...options,
    headers: {
      Authorization: `Basic ${credentials}`,
      "Content-Type": "application/fhir+json",
      ...options.headers,
    },
  });

  if (response.status === 404) {
    throw new NotFoundError(path, await response.text());
  }
  if (!response.ok) {
    throw new HttpError(response.status, await response.text());
  }

  return response.json() as Promise<T>;
}

export interface BundleLink {
  relation: string;
  url: string;
}

export interface Bundle<T> {
  total?: number;
  link?: BundleLink[];
  entry?: Array<{ resource: T }>;
}

/**
 * Resolve a Bundle link (absolute or server-relative) to a path for aidboxFetch.
 */
export function toAidboxPath(url: string): string {
  const resolved = new URL(url, AIDBOX_URL);
  return `${resolved.pathname}${resolved.search}`;
}

export async function putResource<T>(resourceType: string, id: string, resource: T): Promise<T> {
  return aidboxFetch<T>(`/fhir/${resourceType}/${id}`, {
    method: "PUT",
    body: JSON.stringify(resource),
  });
}
