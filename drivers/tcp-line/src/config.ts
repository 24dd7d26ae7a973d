import { z } from "zod";
import { EndpointSchema } from "@upsctl/schemas";

export const TcpLineTransportConfigSchema = EndpointSchema.extend({
  // Grace period for the peer to acknowledge our FIN before the socket is destroyed.
  closeGraceMs: z.number().int().nonnegative().default(1000)
});

export type TcpLineTransportConfig = z.infer<typeof TcpLineTransportConfigSchema>;
export type TcpLineTransportConfigInput = z.input<typeof TcpLineTransportConfigSchema>;
