// src/lib/whatsapp/normalize.ts

/**
 * Clave canónica del teléfono: sin prefijo del gateway ("whatsapp:", "tel:"),
 * con "+" inicial y solo dígitos.
 *   "whatsapp:+5215512345678" → "+5215512345678"
 *   " 52 1 55-1234-5678 "     → "+5215512345678"
 * Devuelve "" si no quedan dígitos.
 */
export function normalizarTelefono(raw: string | null | undefined): string {
  const sinPrefijo = (raw || '')
    .trim()
    .replace(/^whatsapp:/i, '')
    .replace(/^tel:/i, '')
    .trim();

  const digits = sinPrefijo.replace(/\D/g, '');
  return digits ? `+${digits}` : '';
}

/** Dirección que espera Twilio para WhatsApp: "whatsapp:+52155…" */
export function direccionWhatsApp(telefono: string): string {
  const canon = normalizarTelefono(telefono);
  return canon ? `whatsapp:${canon}` : '';
}
