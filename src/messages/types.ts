import { Urgency } from '../shared/types/index.js';

export interface AcknowledgmentSubjectContext {
  productCount: number;
  first?: string;
  second?: string;
  isSingle: boolean;
  isPair: boolean;
  urgency: Urgency | null;
}

export interface AcknowledgmentGreetingContext {
  name: string | null;
}

export interface AcknowledgmentBodyContext {
  isHigh: boolean;
  isMedium: boolean;
  companyName: string;
  singleProduct?: { name: string; quantity: number | null };
  productNames: string[];
  singleGap?: string;
  gapCount: number;
  responseHours: number;
  contactEmail: string;
}

export interface AcknowledgmentClosingContext {
  companyName: string;
  contactEmail: string;
}
