import { describe, it, expect } from 'vitest';
import { generateAcknowledgment, generateQuestions, QUESTIONS } from './acknowledgment.generator.js';
import { AcknowledgmentSettings, ParsedEvent } from '../../shared/types/index.js';

const SETTINGS: AcknowledgmentSettings = {
  companyName: 'Acme Corp',
  contactEmail: 'sales@acme.com',
  slaHours: 24,
};

const NOW = new Date('2026-06-02T10:00:00.000Z');

const NEXT_STEPS = (hours: number) =>
  `We will provide your quote within ${hours} hours. If you have any questions, please don't hesitate to contact us at sales@acme.com.`;

function makeEvent(overrides: Partial<ParsedEvent> = {}): ParsedEvent {
  return {
    email_id: 'a1b2c3d4e5f6',
    timestamp: '2026-06-02T09:30:00.000Z',
    sender: { name: 'Jane Doe', email: 'jane@example.com', confidence: 1 },
    products: [],
    urgency: null,
    currency: null,
    gaps: [],
    raw_content: '',
    ...overrides,
  };
}

function product(name: string, quantity: number | null) {
  return { name, quantity, unit: null, confidence: quantity === null ? 0.9 : 1, notes: '' };
}

describe('generateAcknowledgment', () => {
  it('should draft an urgent reply for a complete single-product request', () => {
    const ack = generateAcknowledgment(
      makeEvent({ products: [product('Widget Pro', 10)], urgency: 'high' }),
      SETTINGS,
      NOW
    );

    expect(ack).toEqual({
      email_id: 'a1b2c3d4e5f6',
      timestamp: '2026-06-02T10:00:00.000Z',
      to: 'jane@example.com',
      subject: 'Re: Widget Pro Quote Request - URGENT',
      greeting: 'Dear Jane Doe,',
      body: [
        'Thank you for your urgent inquiry. We understand the time-sensitive nature of your request and will prioritize your quote accordingly.',
        'We have received your request for 10 Widget Pro.',
        'We have all the necessary information to prepare your quote.',
        NEXT_STEPS(12),
      ].join('\n\n'),
      questions: [QUESTIONS.delivery],
      closing: 'Best regards,\n\nAcme Corp Sales Team\nsales@acme.com',
      sla_hours: 24,
      urgency_level: 'high',
    });
  });

  it('should ask about a single gap and address an unnamed sender', () => {
    const ack = generateAcknowledgment(
      makeEvent({
        sender: { name: null, email: 'buyer@example.com', confidence: 0.6 },
        products: [product('Tool Kit', null)],
        gaps: ['Missing quantity for Tool Kit'],
      }),
      SETTINGS,
      NOW
    );

    expect(ack.subject).toBe('Re: Tool Kit Quote Request');
    expect(ack.greeting).toBe('Dear Valued Customer,');
    expect(ack.body).toBe(
      [
        'Thank you for your inquiry. We appreciate your interest in Acme Corp products.',
        'We have received your inquiry about Tool Kit.',
        'To provide you with an accurate quote, we need some additional information: missing quantity for tool kit',
        NEXT_STEPS(24),
      ].join('\n\n')
    );
    expect(ack.questions).toEqual([
      'What quantity of Tool Kit do you need?',
      QUESTIONS.contact,
    ]);
  });

  it('should list several products and summarize several gaps', () => {
    const ack = generateAcknowledgment(
      makeEvent({
        products: [product('Widget Pro', 10), product('Gadget Basic', null), product('Tool Kit', null)],
        urgency: 'medium',
        gaps: ['Missing quantity for Gadget Basic', 'Missing quantity for Tool Kit'],
      }),
      SETTINGS,
      NOW
    );

    expect(ack.subject).toBe('Re: Quote Request for 3 Items - Priority');
    expect(ack.body).toBe(
      [
        'Thank you for your inquiry. We appreciate your interest in our products and will process your request promptly.',
        'We have received your inquiry about the following products: Widget Pro, Gadget Basic, Tool Kit.',
        'To provide you with an accurate quote, we need some additional information about your requirements.',
        NEXT_STEPS(24),
      ].join('\n\n')
    );
    expect(ack.questions).toEqual([
      'What quantity of Gadget Basic do you need?',
      'What quantity of Tool Kit do you need?',
    ]);
  });

  it('should name both products of a pair in the subject', () => {
    const ack = generateAcknowledgment(
      makeEvent({ products: [product('Widget Pro', 1), product('Bulk Pack', 2)] }),
      SETTINGS,
      NOW
    );

    expect(ack.subject).toBe('Re: Widget Pro and Bulk Pack Quote Request');
  });

  it('should ask for details when no products were found', () => {
    const ack = generateAcknowledgment(makeEvent({ urgency: 'medium' }), SETTINGS, NOW);

    expect(ack.subject).toBe('Re: Your Inquiry - Additional Information Needed');
    expect(ack.body).toBe(
      [
        'Thank you for your inquiry. We appreciate your interest in our products and will process your request promptly.',
        'We have all the necessary information to prepare your quote.',
        NEXT_STEPS(24),
      ].join('\n\n')
    );
    expect(ack.questions).toEqual([QUESTIONS.products, QUESTIONS.delivery]);
  });
});

describe('generateQuestions', () => {
  it('should ask the sender to confirm contact details when unsure who wrote', () => {
    const questions = generateQuestions(
      makeEvent({ sender: { name: null, email: null, confidence: 0 } })
    );

    expect(questions).toEqual([QUESTIONS.contact]);
  });

  it('should never ask more than two questions', () => {
    const questions = generateQuestions(
      makeEvent({
        sender: { name: 'Jane Doe', email: null, confidence: 0.4 },
        products: [product('Widget Pro', null), product('Tool Kit', null), product('Bulk Pack', null)],
      })
    );

    expect(questions).toEqual([
      'What quantity of Widget Pro do you need?',
      'What quantity of Tool Kit do you need?',
    ]);
  });
});
