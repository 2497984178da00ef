import { describe, expect, it } from 'vitest';
import { RegistroNegocios } from '../src/lib/negocios';
import { cargarRegistro } from './helpers/fakes';

function perfil(nombre: string, numeros: string[]) {
  return {
    nombre,
    numeros,
    conocimiento: [`Eres el asistente de ${nombre}.`],
    reglas: [{ intencion: 'horario', palabras: ['horario'], respuesta: `Horario de ${nombre}` }],
    menu: `Menú de ${nombre}`,
  };
}

describe('RegistroNegocios', () => {
  it('carga el colegio del archivo de configuración', async () => {
    const registro = await cargarRegistro();
    const colegio = registro.porDefecto;
    expect(colegio.id).toBe('colegio');
    expect(colegio.zonaHoraria).toBe('America/Mexico_City');
    expect(colegio.reglas.map((r) => r.intencion)).toEqual(['saludo', 'horario', 'ubicacion', 'costo', 'agendar', 'programas']);
    expect(Object.isFrozen(colegio)).toBe(true);
  });

  it('resuelve por el número To y si no, usa el de por defecto', () => {
    const registro = RegistroNegocios.desdeJson({
      default: 'norte',
      negocios: {
        norte: perfil('Colegio Norte', ['whatsapp:+5215500000001']),
        sur: perfil('Colegio Sur', ['+52 155 0000 0002']),
      },
    });

    expect(registro.resolver('whatsapp:+5215500000002').nombre).toBe('Colegio Sur');
    expect(registro.resolver('+5215500000001').nombre).toBe('Colegio Norte');
    expect(registro.resolver('whatsapp:+19999999999').nombre).toBe('Colegio Norte');
    expect(registro.resolver(undefined).nombre).toBe('Colegio Norte');
    expect(registro.resolver('whatsapp:+5215500000002').zonaHoraria).toBe('America/Mexico_City');
  });

  it('rechaza intenciones desconocidas', () => {
    expect(() =>
      RegistroNegocios.desdeJson({
        negocios: {
          x: { ...perfil('X', []), reglas: [{ intencion: 'pizza', palabras: ['pizza'], respuesta: 'no' }] },
        },
      })
    ).toThrow('negocios: "negocios.x.reglas[0].intencion" desconocida: pizza');
  });

  it('rechaza un default inexistente', () => {
    expect(() => RegistroNegocios.desdeJson({ default: 'nada', negocios: { x: perfil('X', []) } })).toThrow(
      'negocios: el negocio por defecto "nada" no existe'
    );
  });

  it('exige el menú', () => {
    const { menu: _menu, ...sinMenu } = perfil('X', []);
    expect(() => RegistroNegocios.desdeJson({ negocios: { x: sinMenu } })).toThrow(
      'negocios: "negocios.x.menu" debe ser un texto no vacío'
    );
  });
});
