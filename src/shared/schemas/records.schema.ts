import { z } from 'zod';
import { Acknowledgment, ParsedEvent, Quote } from '../types/index.js';

const UrgencySchema = z.enum(['high', 'medium', 'low']);

export const ParsedEventSchema: z.ZodType<ParsedEvent> = z.object({
  email_id: z.string().min(1),
  timestamp: z.string().datetime(),
  sender: z.object({
    name: z.string().nullable(),
    email: z.string().nullable(),
    confidence: z.number().min(0).max(1),
  }),
  products: z.array(
    z.object({
      name: z.string(),
      quantity: z.number().nullable(),
      unit: z.string().nullable(),
      confidence: z.number().min(0).max(1),
      notes: z.string(),
    })
  ),
  urgency: UrgencySchema.nullable(),
  currency: z.string().nullable(),
  gaps: z.array(z.string()),
  raw_content: z.string(),
});

export const QuoteSchema: z.ZodType<Quote> = z.object({
  email_id: z.string().min(1),
  timestamp: z.string().datetime(),
  status: z.enum(['complete', 'pending']),
  line_items: z.array(
    z.object({
      product: z.string(),
      quantity: z.number(),
      unit_price: z.number(),
      total: z.number(),
      unit: z.string(),
    })
  ),
  subtotal: z.number(),
  discount: z.number(),
  tax: z.number(),
  total: z.number(),
  currency: z.string(),
  pending_reasons: z.array(z.string()),
  valid_until: z.string().datetime(),
  discount_rate: z.number(),
});

export const AcknowledgmentSchema: z.ZodType<Acknowledgment> = z.object({
  email_id: z.string().min(1),
  timestamp: z.string().datetime(),
  to: z.string().nullable(),
  subject: z.string(),
  greeting: z.string(),
  body: z.string(),
  questions: z.array(z.string()),
  closing: z.string(),
  sla_hours: z.number(),
  urgency_level: UrgencySchema.nullable(),
});
