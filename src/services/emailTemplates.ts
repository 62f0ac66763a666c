// Email Template Infrastructure
//
// Table layouts with inline styles so Outlook renders the same markup as
// every other client.

import { env } from '../config/env.js'

// ============================================
// EMAIL CONFIGURATION
// ============================================

export const MAX_RETRIES = 3
export const RETRY_DELAYS_MS = [1000, 3000, 5000] // 1s, 3s, 5s

const PALETTE = {
  accent: '#2563EB',
  page: '#F4F5F7',
  card: '#FFFFFF',
  panel: '#F1F3F6',
  rule: '#E3E6EB',
  ink: '#1F2328',
  body: '#57606A',
  faint: '#8C959F',
  urgent: '#B45309',
  urgentBg: '#FEF3C7',
}

const FONTS = "-apple-system, 'Segoe UI', Roboto, Arial, sans-serif"

// ============================================
// HELPERS
// ============================================

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  '\'': '&#39;',
}

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch)
}

/** Header injection guard: subjects are single-line. */
export function sanitizeEmailSubject(value: string): string {
  return value.replace(/[\r\n]+/g, ' ').trim()
}

/**
 * Formats an amount in major units ("15.99") for display.
 * Unknown currency codes fall back to "XYZ 15.99".
 */
export function formatAmountForEmail(amount: number, currency: string): string {
  try {
    return new Intl.NumberFormat('en-US', { style: 'currency', currency }).format(amount)
  } catch {
    return `${currency} ${amount.toFixed(2)}`
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

// ============================================
// LAYOUT
// ============================================

export interface LayoutOptions {
  preheader?: string
  /** Plain text, escaped here */
  headline: string
  /** Already-escaped HTML */
  body: string
  /** Plain text label above the headline */
  eyebrow?: string
}

export function baseTemplate(options: LayoutOptions): string {
  const { preheader, headline, body, eyebrow } = options

  const hidden = preheader
    ? `<div style="display: none; max-height: 0; overflow: hidden;">${escapeHtml(preheader)}</div>`
    : ''

  const label = eyebrow
    ? `<p style="margin: 0 0 8px 0; font-size: 12px; font-weight: 600; letter-spacing: 0.6px; text-transform: uppercase; color: ${PALETTE.accent};">${escapeHtml(eyebrow)}</p>`
    : ''

  return `
<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(headline)}</title>
</head>
<body style="margin: 0; padding: 0; background-color: ${PALETTE.page}; font-family: ${FONTS};">
  ${hidden}
  <table role="presentation" cellpadding="0" cellspacing="0" width="100%" style="background-color: ${PALETTE.page};">
    <tr>
      <td align="center" style="padding: 32px 16px;">
        <table role="presentation" cellpadding="0" cellspacing="0" width="100%" style="max-width: 540px; background-color: ${PALETTE.card}; border: 1px solid ${PALETTE.rule}; border-radius: 12px;">
          <tr>
            <td style="padding: 36px;">
              ${label}
              <h1 style="margin: 0 0 20px 0; font-size: 24px; font-weight: 600; line-height: 1.25; color: ${PALETTE.ink};">${escapeHtml(headline)}</h1>
              <div style="font-size: 15px; line-height: 1.6; color: ${PALETTE.body};">
                ${body}
              </div>
            </td>
          </tr>
          <tr>
            <td align="center" style="padding: 20px 36px; border-top: 1px solid ${PALETTE.rule}; font-size: 12px; color: ${PALETTE.faint};">
              <a href="${escapeHtml(env.APP_URL)}/settings/notifications" style="color: ${PALETTE.faint};">Manage reminder emails</a>
            </td>
          </tr>
        </table>
      </td>
    </tr>
  </table>
</body>
</html>
  `.trim()
}

// ============================================
// COMPONENTS
// ============================================

/** Label/value rows on a shaded panel */
export function detailsPanel(rows: Array<{ label: string; value: string; emphasize?: boolean }>): string {
  const cells = rows.map((row, index) => {
    const divider = index < rows.length - 1 ? `border-bottom: 1px solid ${PALETTE.rule};` : ''
    const weight = row.emphasize ? '600' : '400'
    return `
      <tr>
        <td style="padding: 12px 0; ${divider} font-size: 14px; color: ${PALETTE.faint};">${escapeHtml(row.label)}</td>
        <td align="right" style="padding: 12px 0; ${divider} font-size: 14px; font-weight: ${weight}; color: ${PALETTE.ink};">${escapeHtml(row.value)}</td>
      </tr>
    `
  }).join('')

  return `
    <table role="presentation" cellpadding="0" cellspacing="0" width="100%" style="margin: 20px 0; background-color: ${PALETTE.panel}; border-radius: 10px;">
      <tr>
        <td style="padding: 4px 20px;">
          <table role="presentation" cellpadding="0" cellspacing="0" width="100%">${cells}</table>
        </td>
      </tr>
    </table>
  `
}

/** "Today" / "Tomorrow" / "In N days" pill, amber when the date is close */
export function countdownChip(days: number, urgent: boolean = false): string {
  const text = days === 0 ? 'Today' : days === 1 ? 'Tomorrow' : `In ${days} days`
  const color = urgent ? PALETTE.urgent : PALETTE.body
  const background = urgent ? PALETTE.urgentBg : PALETTE.panel

  return `<p style="margin: 0 0 20px 0;"><span style="display: inline-block; padding: 6px 14px; border-radius: 999px; background-color: ${background}; color: ${color}; font-size: 13px; font-weight: 600;">${text}</span></p>`
}

export function mutedText(text: string): string {
  return `<p style="margin: 16px 0 0 0; font-size: 13px; color: ${PALETTE.faint};">${escapeHtml(text)}</p>`
}
