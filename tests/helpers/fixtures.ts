import { Candidate } from '../../src/types';

export function wiseEmail(id: string, amount: string, currency: string, merchant: string, date: Date): Candidate {
  return {
    id,
    threadId: `t-${id}`,
    subject: `You spent ${amount} ${currency}`,
    from: 'Wise <noreply@wise.com>',
    date,
    plainBody: '',
    htmlBody: `<html><head><title>Wise</title><style>p { color: red; }</style></head>` +
      `<body><table><tr><td>Hi Sam,</td><td>You spent ${amount} ${currency} at ${merchant}. Your balance is updated.</td></tr></table></body></html>`,
  };
}

export function paypalEmail(id: string, amount: string, currency: string, merchant: string, date: Date): Candidate {
  return {
    id,
    threadId: `t-${id}`,
    subject: 'Von Ihnen gezahlt',
    from: 'service@paypal.de',
    date,
    plainBody: `Hallo Sam,\n\nSie haben ${amount} ${currency} an ${merchant} gesendet.\n\nDanke`,
    htmlBody: '',
  };
}

export function otherEmail(id: string, from: string, body: string, date: Date): Candidate {
  return {
    id,
    threadId: `t-${id}`,
    subject: 'Notice',
    from,
    date,
    plainBody: body,
    htmlBody: '',
  };
}

export function httpError(status: number, message: string): Error {
  return Object.assign(new Error(message), { status });
}

export const noSleep = async (_ms: number): Promise<void> => {};
