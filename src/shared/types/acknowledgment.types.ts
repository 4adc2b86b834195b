import { Urgency } from './event.types.js';

/**
 * Reply drafted for the sender, persisted as `outbox/{email_id}_ack.json`.
 */
export interface Acknowledgment {
  email_id: string;
  timestamp: string;
  to: string | null;
  subject: string;
  greeting: string;
  body: string;
  questions: string[];
  closing: string;
  sla_hours: number;
  urgency_level: Urgency | null;
}

export interface AcknowledgmentSettings {
  companyName: string;
  contactEmail: string;
  slaHours: number;
}
