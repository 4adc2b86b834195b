/**
 * Structured extraction of one inbound email, persisted as `events/{email_id}.json`.
 * Absent values are `null` so they survive JSON serialization.
 */
export interface ParsedEvent {
  email_id: string;
  timestamp: string;
  sender: SenderInfo;
  products: ExtractedProduct[];
  urgency: Urgency | null;
  currency: string | null;
  gaps: string[];
  raw_content: string;
}

export type Urgency = 'high' | 'medium' | 'low';

export interface SenderInfo {
  name: string | null;
  email: string | null;
  confidence: number;
}

export interface ExtractedProduct {
  name: string;
  quantity: number | null;
  unit: string | null;
  confidence: number;
  notes: string;
}
