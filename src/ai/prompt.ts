import { CoarseRecord } from '../types';
import { CategoryHint } from '../rules/engine';

export interface PromptOptions {
  categories: readonly string[];
  accounts: readonly string[];
  hints?: CategoryHint[];
}

const CATEGORY_RULES: Record<string, string> = {
  Transport: 'rides, fuel, parking, vehicle services',
  'Food & Dining': 'restaurants, cafes, bars, food delivery',
  Travel: 'hotels, flights, tourism activities',
  Home: 'furniture, maintenance, home services',
  Utilities: 'internet, phone, web services, hosting, domains, subscriptions',
  People: 'transfers, gifts, personal services',
  Shopping: 'retail stores, online shopping, general merchandise',
  Grocery: 'supermarkets, food stores, markets',
  Other: "anything that doesn't fit the categories above",
};

const EXAMPLES: Array<{ input: CoarseRecord; output: Record<string, string> }> = [
  {
    input: { description: 'You spent 24.95 USD at Coffee Shop Downtown.', date: '15-04-2025 02:30 PM', account: 'Wise' },
    output: {
      amount: '24.95',
      currency: 'USD',
      merchant: 'Coffee Shop Downtown',
      category: 'Food & Dining',
      date: '15-04-2025',
      time: '2:30 PM',
      account: 'Wise',
    },
  },
  {
    input: { description: 'You spent 1,250 MXN at Hotel Centro.', date: '03-11-2024 12:05 AM', account: 'PayPal' },
    output: {
      amount: '1250.00',
      currency: 'MXN',
      merchant: 'Hotel Centro',
      category: 'Travel',
      date: '03-11-2024',
      time: '12:05 AM',
      account: 'PayPal',
    },
  },
];

/**
 * Same record and options always yield the same prompt text.
 */
export function buildPrompt(record: CoarseRecord, options: PromptOptions): string {
  const categoryList = options.categories.map(c => `"${c}"`).join(', ');
  const accountList = options.accounts.map(a => `"${a}"`).join(', ');

  const categoryRules = options.categories
    .map(c => `   - ${c}${CATEGORY_RULES[c] ? `: ${CATEGORY_RULES[c]}` : ''}`)
    .join('\n');

  const hintLines = (options.hints ?? [])
    .filter(h => options.categories.includes(h.category))
    .map(h => `   - ${h.match} -> ${h.category}`)
    .join('\n');

  const examples = EXAMPLES
    .map((ex, i) => `Example ${i + 1}\nInput: ${JSON.stringify(ex.input)}\nOutput: ${JSON.stringify(ex.output)}`)
    .join('\n\n');

  const sections = [
    'Format this transaction as a single JSON object. Important rules:',
    '1. Output MUST be one raw JSON object only - no markdown, no code blocks, no backticks, no extra text.',
    [
      '2. The object has exactly these seven string fields:',
      '   - amount: digits with exactly 2 decimal places, no currency symbol, no thousands separator (e.g. "10.95", "466.40")',
      '   - currency: 3-letter uppercase ISO code (e.g. "USD", "EUR", "MXN")',
      '   - merchant: full business name, including location if provided',
      `   - category: exactly one of ${categoryList}`,
      '   - date: DD-MM-YYYY',
      '   - time: 12-hour clock h:mm AM/PM, hour from 1 to 12 (midnight is 12:xx AM, never 00:xx)',
      `   - account: exactly one of ${accountList}, copied from the input`,
    ].join('\n'),
    `3. Categories:\n${categoryRules}`,
  ];

  if (hintLines) {
    sections.push(`4. Known merchants:\n${hintLines}`);
  }

  sections.push(`${hintLines ? 5 : 4}. Examples:\n\n${examples}`);
  sections.push(`Transaction to format: ${JSON.stringify(record)}`);

  return sections.join('\n\n');
}
