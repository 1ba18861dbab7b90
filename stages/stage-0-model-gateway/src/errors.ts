/** The backend produced something that is neither a text nor a tool-call reply. */
export class GatewayProtocolError extends Error {
  readonly gateway: string;

  constructor(options: { gateway: string; message: string }) {
    super(options.message);
    this.name = "GatewayProtocolError";
    this.gateway = options.gateway;
  }
}
