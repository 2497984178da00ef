// 🔤 Elimina tildes, pone en minúsculas y recorta espacios
export function normalizarTexto(texto: string): string {
  return texto
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '') // diacríticos
    .trim();
}

/** Recorta a `max` caracteres (contando "…") sin partir emojis. */
export function truncar(texto: string, max: number): string {
  const limpio = (texto || '').trim();
  const chars = Array.from(limpio);
  if (chars.length <= max) return limpio;
  return `${chars.slice(0, Math.max(max - 1, 0)).join('')}…`;
}
