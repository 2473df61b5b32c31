export const mask = (s: string, keep = 6) => (s && s.length > keep * 2 ? s.slice(0, keep) + '…' + s.slice(-keep) : s);

// Telegram bot tokens look like `<digits>:<35 url-safe chars>`
const BOT_TOKEN_RE = /\b\d{6,12}:[A-Za-z0-9_-]{30,}\b/g;

export const maskText = (s: string, secrets: string[] = []) => {
  let out = s.replace(BOT_TOKEN_RE, '[REDACTED]');
  for (const needle of secrets) {
    if (needle) out = out.split(needle).join('[REDACTED]');
  }
  return out.replace(/0x[a-f0-9]{40,64}/gi, (m) => mask(m, 8));
};
