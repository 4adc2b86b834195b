import {
  Acknowledgment,
  AcknowledgmentSettings,
  ExtractedProduct,
  ParsedEvent,
} from '../../shared/types/index.js';
import { messages } from '../../messages/index.js';

const MAX_QUESTIONS = 2;

/** Below this sender confidence we ask the sender to confirm their details. */
const SENDER_CONFIRMATION_THRESHOLD = 0.7;

export const QUESTIONS = {
  quantity: (productName: string) => `What quantity of ${productName} do you need?`,
  contact: 'Could you please confirm your contact information for our records?',
  products: 'What products are you interested in purchasing?',
  delivery: 'Do you have any specific delivery requirements or timeline preferences?',
} as const;

/**
 * Follow-up questions for the sender, at most two.
 */
export function generateQuestions(event: ParsedEvent): string[] {
  const questions: string[] = event.products
    .filter((product) => product.quantity === null)
    .map((product) => QUESTIONS.quantity(product.name));

  if (event.sender.confidence < SENDER_CONFIRMATION_THRESHOLD) {
    questions.push(QUESTIONS.contact);
  }

  if (questions.length === 0) {
    if (event.products.length === 0) {
      questions.push(QUESTIONS.products);
    }
    questions.push(QUESTIONS.delivery);
  }

  return questions.slice(0, MAX_QUESTIONS);
}

function singleProduct(products: ExtractedProduct[]) {
  if (products.length !== 1) return undefined;
  const [product] = products;
  return { name: product.name, quantity: product.quantity };
}

/**
 * Draft the acknowledgment for a ParsedEvent. The same reply is produced whether
 * the quote ends up complete or pending.
 */
export function generateAcknowledgment(
  event: ParsedEvent,
  settings: Readonly<AcknowledgmentSettings>,
  now: Date = new Date()
): Acknowledgment {
  const productNames = event.products.map((p) => p.name);
  const isHigh = event.urgency === 'high';

  const subject = messages.acknowledgment.subject({
    productCount: productNames.length,
    first: productNames[0],
    second: productNames[1],
    isSingle: productNames.length === 1,
    isPair: productNames.length === 2,
    urgency: event.urgency,
  });

  const body = messages.acknowledgment.body({
    isHigh,
    isMedium: event.urgency === 'medium',
    companyName: settings.companyName,
    singleProduct: singleProduct(event.products),
    productNames,
    singleGap: event.gaps.length === 1 ? event.gaps[0] : undefined,
    gapCount: event.gaps.length,
    responseHours: isHigh ? Math.floor(settings.slaHours / 2) : settings.slaHours,
    contactEmail: settings.contactEmail,
  });

  return {
    email_id: event.email_id,
    timestamp: now.toISOString(),
    to: event.sender.email,
    subject,
    greeting: messages.acknowledgment.greeting({ name: event.sender.name }),
    body,
    questions: generateQuestions(event),
    closing: messages.acknowledgment.closing({
      companyName: settings.companyName,
      contactEmail: settings.contactEmail,
    }),
    sla_hours: settings.slaHours,
    urgency_level: event.urgency,
  };
}
