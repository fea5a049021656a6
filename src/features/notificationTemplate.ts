import type { TrackingEvent } from '../state.js';
import type { MessageFormatter, NotificationBody } from '../types.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

export const escapeHtml = (value: string) => value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

const STYLES = `
  .container { font-family: Arial, sans-serif; max-width: 500px; margin: auto; padding: 20px; border: 1px solid #ddd; border-radius: 8px; background-color: #f9f9f9; color: #333; }
  h2 { color: #2E86C1; }
  .info { margin: 10px 0; padding: 10px; background-color: #fff; border-left: 4px solid #2E86C1; box-shadow: 0 2px 4px rgba(0,0,0,0.05); }
  .label { font-weight: bold; display: inline-block; width: 80px; }
  .track-link { display: inline-block; margin-top: 20px; padding: 10px 15px; background-color: #000000; color: white; text-decoration: none; border-radius: 5px; }
  .footer { margin-top: 30px; font-size: 0.9em; color: #777; text-align: center; }
`;

const fields = (event: TrackingEvent): Array<[string, string]> => [
  ['Location', event.location],
  ['Status', event.details],
  ['Date', event.date],
  ['Time', event.time]
];

export const buildNotificationHtml = (event: TrackingEvent, trackingUrl: string): string => {
  const rows = fields(event)
    .map(([label, value]) => `<div class="info"><span class="label">${label}:</span> ${escapeHtml(value)}</div>`)
    .join('\n      ');

  return `<html>
  <head><style>${STYLES}</style></head>
  <body>
    <div class="container">
      <h2>📦 New Tracking Update</h2>
      ${rows}
      <a href="${escapeHtml(trackingUrl)}" class="track-link">🔍 Track Your Package</a>
      <div class="footer">Sent by your waybill tracker</div>
    </div>
  </body>
</html>`;
};

export const buildNotificationText = (waybill: string, event: TrackingEvent, trackingUrl: string): string =>
  [
    `Tracking update for waybill ${waybill}`,
    '',
    ...fields(event).map(([label, value]) => `${label}: ${value}`),
    '',
    `Track your package: ${trackingUrl}`
  ].join('\n');

export const createMessageFormatter =
  (trackingUrl: (waybill: string) => string): MessageFormatter =>
  (waybill, event): NotificationBody => {
    const url = trackingUrl(waybill);
    return {
      html: buildNotificationHtml(event, url),
      text: buildNotificationText(waybill, event, url)
    };
  };
