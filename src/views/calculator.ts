import type { CalculationResult } from '../models/emi.js';
import { formatAmount } from '../utils/format.js';

export interface CalculatorForm {
  calculationType: string;
  principal: string;
  rate: string;
  tenure: string;
  emi: string;
}

export const DEFAULT_FORM: CalculatorForm = {
  calculationType: 'Calculate EMI',
  principal: '500000',
  rate: '8.5',
  tenure: '5',
  emi: '',
};

export interface CalculatorPageState {
  form: CalculatorForm;
  result?: CalculationResult;
  error?: string;
}

const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');

const renderModeOption = (label: string, selected: string): string => `
      <label class="mode">
        <input type="radio" name="calculationType" value="${escapeHtml(label)}"${label === selected ? ' checked' : ''}>
        ${escapeHtml(label)}
      </label>`;

const renderResultText = (state: CalculatorPageState): string => {
  const text = state.error ?? state.result?.summary;
  if (text === undefined) {
    return '';
  }
  return `<pre class="result${state.error ? ' result--error' : ''}" data-result>${escapeHtml(text)}</pre>`;
};

const renderSchedule = (result: CalculationResult | undefined): string => {
  if (!result) {
    return '';
  }
  const rows = result.schedule
    .map(
      (row) => `
        <tr>
          <td>${row.month}</td>
          <td>${formatAmount(row.emi)}</td>
          <td>${formatAmount(row.principalPaid)}</td>
          <td>${formatAmount(row.interestPaid)}</td>
          <td>${formatAmount(row.remainingBalance)}</td>
        </tr>`,
    )
    .join('');
  return `
    <h2>Amortization Schedule</h2>
    <table data-schedule>
      <thead>
        <tr><th>Month</th><th>EMI</th><th>Principal Paid</th><th>Interest Paid</th><th>Remaining Balance</th></tr>
      </thead>
      <tbody>${rows}
      </tbody>
    </table>`;
};

export const renderCalculatorPage = (state: CalculatorPageState): string => {
  const { form } = state;
  const tenureMode = form.calculationType === 'Calculate Tenure';
  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>EMI and Amortization Calculator</title>
  <style>
    body { font-family: system-ui, sans-serif; max-width: 960px; margin: 2rem auto; padding: 0 1rem; color: #1f2937; }
    fieldset { border: 1px solid #d1d5db; border-radius: 8px; margin-bottom: 1rem; }
    label { display: inline-block; margin: 0.25rem 1rem 0.25rem 0; }
    .hidden { display: none; }
    .btn { background: #f97316; color: #fff; border: 0; border-radius: 6px; padding: 0.6rem 1.4rem; font-size: 1rem; }
    .result { background: #f3f4f6; padding: 0.75rem; border-radius: 6px; }
    .result--error { background: #fee2e2; }
    table { border-collapse: collapse; width: 100%; }
    th, td { border-bottom: 1px solid #e5e7eb; padding: 0.35rem 0.5rem; text-align: right; }
  </style>
</head>
<body>
  <h1>EMI and Amortization Calculator</h1>
  <p>Choose whether to calculate the EMI or the loan tenure.</p>
  <form method="post" action="/">
    <fieldset>
      <legend>Calculation Type</legend>${renderModeOption('Calculate EMI', form.calculationType)}${renderModeOption('Calculate Tenure', form.calculationType)}
    </fieldset>
    <fieldset>
      <label>Loan Amount (₹) <input type="number" step="any" name="principal" value="${escapeHtml(form.principal)}"></label>
      <label>Annual Interest Rate (%) <input type="number" step="any" name="rate" value="${escapeHtml(form.rate)}"></label>
    </fieldset>
    <fieldset id="emi-row"${tenureMode ? ' class="hidden"' : ''}>
      <label>Tenure (Years) <input type="range" name="tenure" min="1" max="20" step="1" value="${escapeHtml(form.tenure)}"></label>
    </fieldset>
    <fieldset id="tenure-row"${tenureMode ? '' : ' class="hidden"'}>
      <label>Fixed Monthly EMI (₹) <input type="number" step="any" name="emi" value="${escapeHtml(form.emi)}"></label>
    </fieldset>
    <button class="btn" type="submit">Calculate</button>
  </form>
  ${renderResultText(state)}
  ${renderSchedule(state.result)}
  <script>
    for (const radio of document.querySelectorAll('input[name="calculationType"]')) {
      radio.addEventListener('change', () => {
        const tenure = radio.value === 'Calculate Tenure';
        document.getElementById('emi-row').classList.toggle('hidden', tenure);
        document.getElementById('tenure-row').classList.toggle('hidden', !tenure);
      });
    }
  </script>
</body>
</html>
`;
};
