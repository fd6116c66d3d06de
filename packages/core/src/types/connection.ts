// packages/core/src/types/connection.ts — z/OSMF connection details

export interface ZosConnection {
  host: string;
  port: number;
  user: string;
  password: string;
  /** Prefix inserted before `/zosmf`, for sites behind an API gateway. */
  basePath?: string;
  /** Verify the server certificate. Self-signed lab systems often need false. */
  rejectUnauthorized: boolean;
}
