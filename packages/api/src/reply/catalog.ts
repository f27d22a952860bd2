import type { ReplyOptionsResponse } from '@replydesk/contracts';

export type IntentOption = {
  id: string;
  label: string; // shown to the agent (pt-PT)
  message: string; // what the reply must convey
};

export type ToneOption = {
  id: string;
  label: string;
  instruction: string;
};

export type LengthOption = {
  id: string;
  label: string;
  instruction: string;
  maxTokens: number;
};

export type ReplyCatalog = {
  persona: string;
  language: string;
  avoid: string[];
  intents: IntentOption[];
  tones: ToneOption[];
  lengths: LengthOption[];
  defaults: { tone: string; length: string };
};

export const defaultCatalog: ReplyCatalog = {
  persona:
    'Act as a polite customer service agent for a clothing company. Your task is to generate a polite, brand-consistent email reply.',
  language: 'Everything must be in Portuguese from Portugal.',
  avoid: ['desculpe', 'desculpa', 'a culpa é nossa', 'negativo'],
  intents: [
    { id: 'explain-cause', label: 'Explicar causa do problema', message: 'Explain the cause of the problem.' },
    { id: 'offer-discount', label: 'Oferecer desconto', message: 'Offer a discount on a future purchase.' },
    {
      id: 'no-free-shipping',
      label: 'Explicar que portes grátis não são possíveis nesta encomenda',
      message: 'Explain that free shipping is not possible for this order.',
    },
    { id: 'free-replacement', label: 'Oferecer uma substituição gratuita', message: 'Offer a free replacement of the item.' },
    { id: 'request-details', label: 'Pedir mais informações', message: 'Ask the customer for the details needed to resolve the case (order number, photos).' },
    { id: 'confirm-refund', label: 'Confirmar reembolso', message: 'Confirm that the refund has been processed and when it will arrive.' },
  ],
  tones: [
    { id: 'formal', label: 'Formal', instruction: 'Use a formal, professional tone.' },
    { id: 'friendly', label: 'Próximo', instruction: 'Use a warm, friendly tone while staying professional.' },
    { id: 'empathetic', label: 'Empático', instruction: "Use an empathetic tone that acknowledges the customer's frustration." },
  ],
  lengths: [
    { id: 'short', label: 'Curta', instruction: 'Keep the reply short: at most 80 words.', maxTokens: 250 },
    { id: 'medium', label: 'Média', instruction: 'Keep the reply concise: around 150 words.', maxTokens: 500 },
    { id: 'long', label: 'Detalhada', instruction: 'Write a detailed reply of up to 250 words.', maxTokens: 800 },
  ],
  defaults: { tone: 'formal', length: 'medium' },
};

export function publicOptions(catalog: ReplyCatalog): ReplyOptionsResponse {
  const pick = ({ id, label }: { id: string; label: string }) => ({ id, label });
  return {
    intents: catalog.intents.map(pick),
    tones: catalog.tones.map(pick),
    lengths: catalog.lengths.map(pick),
    defaults: { ...catalog.defaults },
  };
}
