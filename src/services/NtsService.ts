import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import chalk from 'chalk';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { mapLiveResponse, mapMixtapesResponse } from '../mapping/ResponseMapper.js';
import type { Broadcast } from '../models/Broadcast.js';
import type { MixtapeList } from '../models/Mixtape.js';
import { ErrorNts, ManejadorErrores } from '../utils/ErrorHandler.js';

export interface NtsServiceOptions {
  baseURL?: string;
  client?: AxiosInstance;
  // Transporte de axios para el cliente por defecto; se ignora si se pasa `client`
  adapter?: AxiosAdapter;
  verbose?: boolean;
}

/**
 * Servicio para consultar la API pública de NTS.
 * Cada método hace una sola petición GET; no hay reintentos ni caché.
 */
export class NtsService {
  private client: AxiosInstance;
  private manejadorErrores: ManejadorErrores;
  private verbose: boolean;

  constructor(options: NtsServiceOptions = {}) {
    this.manejadorErrores = new ManejadorErrores();
    this.verbose = options.verbose ?? false;
    this.client = options.client ?? axios.create({
      baseURL: options.baseURL ?? DEFAULT_CONFIG.API_BASE_URL,
      headers: {
        'Accept': 'application/json',
      },
      // Timeouts con código ETIMEDOUT en vez de ECONNABORTED
      transitional: {
        clarifyTimeoutError: true,
      },
      adapter: options.adapter,
    });
  }

  /**
   * GET a un endpoint de la API; devuelve el cuerpo ya parseado
   */
  async fetchEndpoint(endpoint: string, timeout: number = DEFAULT_CONFIG.REQUEST_TIMEOUT): Promise<unknown> {
    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw new ErrorNts(
        `El timeout debe ser un número positivo de milisegundos (recibido: ${timeout})`,
        'TIMEOUT_INVALIDO'
      );
    }

    if (this.verbose) {
      console.log(chalk.gray(`→ GET /${endpoint} (timeout ${timeout}ms)`));
    }

    let cuerpo: unknown;
    try {
      // El cuerpo llega como texto: axios devolvería el string crudo si el JSON no parsea
      const response = await this.client.get<unknown>(`/${endpoint}`, { timeout, responseType: 'text' });
      cuerpo = response.data;
    } catch (error) {
      throw this.manejadorErrores.clasificarError(error, endpoint, timeout);
    }

    return this.parsearCuerpo(cuerpo, endpoint);
  }

  private parsearCuerpo(cuerpo: unknown, endpoint: string): unknown {
    if (typeof cuerpo !== 'string') {
      return cuerpo;
    }

    try {
      return JSON.parse(cuerpo);
    } catch (error) {
      throw new ErrorNts(
        `La respuesta de /${endpoint} no es JSON válido`,
        'FORMATO_INVALIDO',
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Obtener el payload crudo de los canales en vivo
   */
  async getLiveData(timeout?: number): Promise<unknown> {
    return this.fetchEndpoint(DEFAULT_CONFIG.ENDPOINTS.LIVE, timeout);
  }

  /**
   * Obtener el payload crudo de las mixtapes
   */
  async getMixtapesData(timeout?: number): Promise<unknown> {
    return this.fetchEndpoint(DEFAULT_CONFIG.ENDPOINTS.MIXTAPES, timeout);
  }

  /**
   * Lo que suena ahora en cada canal
   */
  async getCurrentBroadcasts(timeout?: number): Promise<Broadcast[]> {
    return mapLiveResponse(await this.getLiveData(timeout), 'now');
  }

  /**
   * El próximo programa de cada canal
   */
  async getNextBroadcasts(timeout?: number): Promise<Broadcast[]> {
    return mapLiveResponse(await this.getLiveData(timeout), 'next');
  }

  async getMixtapes(timeout?: number): Promise<MixtapeList> {
    return mapMixtapesResponse(await this.getMixtapesData(timeout));
  }
}
