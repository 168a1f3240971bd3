/**
 * Who is serving: substituted into the landing page template.
 */
export interface IHostIdentity {
  /** Name of the user the server process runs as. */
  userName(): string;

  /** Host name and address, e.g. "web01/192.168.1.20". */
  hostAddress(): string;
}
