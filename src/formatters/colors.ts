import chalk from 'chalk';

export const theme = {
  heading: chalk.bold.cyan,
  subheading: chalk.bold.white,
  positive: chalk.green,
  negative: chalk.red,
  warning: chalk.yellow,
  muted: chalk.gray,
  accent: chalk.magenta,
  money: (n: number) => (n >= 0 ? chalk.green(formatUsd(n)) : chalk.red(formatUsd(n))),
  label: chalk.bold,
};

const usd = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

const usdDetailed = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatUsd(amount: number): string {
  return usd.format(amount);
}

export function formatUsdDetailed(amount: number): string {
  return usdDetailed.format(amount);
}

/** 0.071 → "7.1%" */
export function formatPct(value: number, digits = 1): string {
  return `${(value * 100).toFixed(digits)}%`;
}
