import { describe, expect, it, vi } from 'vitest';
import { PgContactStore } from '../src/lib/contactos/pgStore';
import { prepararStore } from '../src/lib/contactos/prepararStore';
import { storeSinDb } from '../src/lib/contactos/sinDb';

describe('prepararStore', () => {
  it('sin pool usa el store de 503', async () => {
    expect(await prepararStore(null)).toBe(storeSinDb);
  });

  it('si el schema no se aplicó no usa Postgres', async () => {
    const query = vi.fn();
    const store = await prepararStore({ query }, async () => false);

    expect(store).toBe(storeSinDb);
    await expect(store.listarContactos({ limit: 10, offset: 0 })).rejects.toThrow('Base de datos no disponible');
    expect(query).not.toHaveBeenCalled();
  });

  it('con el schema listo usa Postgres', async () => {
    const inicializar = vi.fn(async () => true);
    const pool = { query: vi.fn() };

    expect(await prepararStore(pool, inicializar)).toBeInstanceOf(PgContactStore);
    expect(inicializar).toHaveBeenCalledWith(pool);
  });
});
