/**
 * HTML rendering for the calculator form
 */

import { FIELDS } from '../core/constants.js';
import { formatWithSign } from '../utils/decimal.js';
import type { EvaluationResult, RawFields } from '../core/types.js';

export interface PageState {
  fields?: RawFields;
  result?: EvaluationResult;
  error?: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

const NUMERIC_INPUTS: Array<{ name: string; label: string }> = [
  { name: FIELDS.SPOT_PRICE, label: 'Spot price' },
  { name: FIELDS.STRIKE_PRICE, label: 'Strike price' },
  { name: FIELDS.VOLATILITY, label: 'Volatility (%)' },
  { name: FIELDS.RISK_FREE_RATE, label: 'Risk-free rate (%)' },
  { name: FIELDS.TIME_TO_EXPIRY, label: 'Time to expiry (days)' },
  { name: FIELDS.MARKET_PRICE, label: 'Market price' },
];

function input(name: string, label: string, fields: RawFields, type = 'text'): string {
  const value = escapeHtml(fields[name] ?? '');
  return `<label>${label} <input type="${type}" name="${name}" value="${value}"></label>`;
}

function optionTypeSelect(fields: RawFields): string {
  const selected = (fields[FIELDS.OPTION_TYPE] ?? 'call').trim().toLowerCase();
  const option = (value: string, label: string): string =>
    `<option value="${value}"${selected === value ? ' selected' : ''}>${label}</option>`;
  return `<label>Option type <select name="${FIELDS.OPTION_TYPE}">${option('call', 'Call')}${option('put', 'Put')}</select></label>`;
}

function renderResult(result: EvaluationResult): string {
  const title = [result.symbol, result.optionType, result.expiryDate]
    .filter((part): part is string => part !== undefined)
    .map(escapeHtml)
    .join(' ');

  return [
    '<section class="result">',
    `<h2>${title}</h2>`,
    `<p>Theoretical price: <strong>${result.theoreticalPrice.toFixed(2)}</strong></p>`,
    `<p>Edge: <strong>${formatWithSign(result.edge)}</strong></p>`,
    `<p>Recommendation: <strong>${escapeHtml(result.recommendation)}</strong></p>`,
    '</section>',
  ].join('\n');
}

export function renderPage(state: PageState = {}): string {
  const fields = state.fields ?? {};

  const body = [
    '<h1>Option Edge Calculator</h1>',
    state.error ? `<p class="error">${escapeHtml(state.error)}</p>` : '',
    '<form method="post" action="/">',
    input(FIELDS.SYMBOL, 'Symbol', fields),
    input(FIELDS.EXPIRY_DATE, 'Expiry date', fields, 'date'),
    ...NUMERIC_INPUTS.map(({ name, label }) => input(name, label, fields)),
    optionTypeSelect(fields),
    '<button type="submit">Calculate</button>',
    '</form>',
    state.result ? renderResult(state.result) : '',
  ].filter(Boolean);

  return `<!DOCTYPE html>
<html lang="en">
<head><meta charset="utf-8"><title>Option Edge Calculator</title></head>
<body>
${body.join('\n')}
</body>
</html>
`;
}
