import { z } from 'zod';

export type Sample = {
  /** Seconds from the start of the window. */
  time: number;
  amplitude: number;
};

export type WaveformWindow = readonly Sample[];

/** Wire shape of one sample: `time` is dropped, a wall-clock stamp is added. */
export const OutboundRecordSchema = z.object({
  timestamp: z.string().datetime({ offset: true }),
  ecg_signal: z.number().finite()
});

export type OutboundRecord = z.infer<typeof OutboundRecordSchema>;

export const EcgEnvelopeSchema = z.object({
  user_id: z.string().min(1),
  data: z.array(OutboundRecordSchema)
});

export const EcgPayloadSchema = z.union([z.array(OutboundRecordSchema), EcgEnvelopeSchema]);

export type EcgPayload = z.infer<typeof EcgPayloadSchema>;

export type EcgRecord = OutboundRecord & {
  userId?: string;
  receivedAt: number;
};
