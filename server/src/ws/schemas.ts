import { z } from 'zod';

export const envelopeSchema = z.object({
  type: z.string(),
  sessionId: z.string().min(1).optional(),
});

export const answerMessageSchema = z.object({
  type: z.literal('answer'),
  sessionId: z.string().min(1),
  sdp: z.string().min(1),
});

export const iceCandidateSchema = z.object({
  candidate: z.string(),
  sdpMid: z.string().nullish(),
  sdpMLineIndex: z.number().int().nonnegative().nullish(),
  usernameFragment: z.string().nullish(),
});

export const iceCandidateMessageSchema = z.object({
  type: z.literal('ice-candidate'),
  sessionId: z.string().min(1),
  candidate: iceCandidateSchema.nullable(),
});
