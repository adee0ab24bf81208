import { z } from 'zod';

export interface AriClientOptions {
  baseUrl: string;
  username: string;
  password: string;
  app: string;
  timeoutMs: number;
  maxRetries?: number;
}

export type AriQuery = Record<string, string | number | boolean | undefined>;

export const AriChannelSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional(),
    state: z.string().optional(),
    caller: z.object({ name: z.string().optional(), number: z.string().optional() }).partial().optional(),
    connected: z.object({ name: z.string().optional(), number: z.string().optional() }).partial().optional(),
    dialplan: z.object({ exten: z.string().optional() }).partial().optional(),
  })
  .passthrough();

export type AriChannel = z.infer<typeof AriChannelSchema>;

export const AriEventSchema = z
  .object({
    type: z.string().min(1),
    application: z.string().optional(),
    channel: AriChannelSchema.optional(),
    args: z.array(z.string()).optional(),
    cause: z.number().optional(),
    cause_txt: z.string().optional(),
    recording: z.object({ name: z.string(), state: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export type AriEvent = z.infer<typeof AriEventSchema>;
