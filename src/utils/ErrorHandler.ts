import axios, { AxiosError } from 'axios';


export class ErrorNts extends Error {
  constructor(
    mensaje: string,
    public readonly codigo: string = 'ERROR_DESCONOCIDO',
    public readonly errorOriginal?: Error
  ) {
    super(mensaje);
    this.name = 'ErrorNts';
  }
}

export class ErrorRespuestaNts extends ErrorNts {
  constructor(
    public readonly codigoEstado: number,
    mensaje: string,
    public readonly cuerpo?: unknown,
    errorOriginal?: Error
  ) {
    super(`La API devolvió ${codigoEstado}: ${mensaje}`, `ERROR_HTTP_${codigoEstado}`, errorOriginal);
    this.name = 'ErrorRespuestaNts';
  }
}

export class ErrorTiempoAgotadoNts extends ErrorNts {
  constructor(
    mensaje: string,
    public readonly tiempoLimite?: number,
    errorOriginal?: Error
  ) {
    super(mensaje, 'TIEMPO_AGOTADO', errorOriginal);
    this.name = 'ErrorTiempoAgotadoNts';
  }
}


export class ManejadorErrores {

  /**
   * Convierte cualquier error de una petición en uno de la jerarquía ErrorNts
   */
  clasificarError(error: unknown, endpoint: string, tiempoLimite?: number): ErrorNts {
    if (error instanceof ErrorNts) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      return this.clasificarErrorAxios(error, endpoint, tiempoLimite);
    }

    if (error instanceof Error) {
      return new ErrorNts(
        `La petición a ${endpoint} falló: ${error.message}`,
        'ERROR_DESCONOCIDO',
        error
      );
    }

    return new ErrorNts(
      'Ocurrió un error desconocido',
      'ERROR_DESCONOCIDO'
    );
  }


  private clasificarErrorAxios(error: AxiosError, endpoint: string, tiempoLimite?: number): ErrorNts {
    // Sin `transitional.clarifyTimeoutError` axios marca el timeout como ECONNABORTED,
    // código que también usa para peticiones abortadas
    const esTimeout = error.code === AxiosError.ETIMEDOUT ||
      (error.code === AxiosError.ECONNABORTED && /^timeout of \d+ms exceeded/.test(error.message));
    if (esTimeout) {
      const detalle = tiempoLimite !== undefined ? ` después de ${tiempoLimite}ms` : '';
      return new ErrorTiempoAgotadoNts(
        `Se agotó el tiempo de espera${detalle} (${endpoint})`,
        tiempoLimite,
        error
      );
    }

    // Sin respuesta - error de red
    if (!error.response) {
      return new ErrorNts(
        `Error de red: ${error.message}`,
        'ERROR_RED',
        error
      );
    }

    const estado = error.response.status;
    const textoEstado = error.response.statusText || this.resumirCuerpo(error.response.data);

    return new ErrorRespuestaNts(
      estado,
      textoEstado || error.message,
      error.response.data,
      error
    );
  }

  private resumirCuerpo(cuerpo: unknown): string {
    if (typeof cuerpo === 'string') {
      return cuerpo.slice(0, 200);
    }
    return '';
  }

  /**
   * Obtener mensaje de error amigable para mostrar al usuario
   */
  obtenerMensajeAmigable(error: ErrorNts): string {
    if (error instanceof ErrorTiempoAgotadoNts) {
      return 'NTS tardó demasiado en responder. Por favor intenta de nuevo en unos segundos.';
    }

    if (error instanceof ErrorRespuestaNts) {
      if (error.codigoEstado >= 500) {
        return `El servicio de NTS no está disponible temporalmente (${error.codigoEstado}). Por favor intenta más tarde.`;
      }
      return error.message;
    }

    switch (error.codigo) {
      case 'ERROR_RED':
        return 'Error de conexión de red. Por favor verifica tu conexión a internet e intenta de nuevo.';

      case 'FORMATO_INVALIDO':
        return `NTS respondió con un formato inesperado: ${error.message}`;

      default:
        return error.message;
    }
  }
}
