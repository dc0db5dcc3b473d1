import { DEFAULT_CONFIG } from './config/defaults.js';
import type { Broadcast } from './models/Broadcast.js';
import type { MixtapeList } from './models/Mixtape.js';
import { NtsService } from './services/NtsService.js';

export * from './models/index.js';
export {
  mapBroadcast,
  mapDetails,
  mapLink,
  mapLiveResponse,
  mapMixtape,
  mapMixtapesResponse,
  type BroadcastSlot,
} from './mapping/ResponseMapper.js';
export { NtsService, type NtsServiceOptions } from './services/NtsService.js';
export {
  ErrorNts,
  ErrorRespuestaNts,
  ErrorTiempoAgotadoNts,
  ManejadorErrores,
} from './utils/ErrorHandler.js';
export { DEFAULT_CONFIG } from './config/defaults.js';

const servicioPredeterminado = new NtsService();

/**
 * GET a cualquier endpoint de la API (p. ej. 'live', 'mixtapes')
 */
export function fetchNtsApi(endpoint: string, timeout: number = DEFAULT_CONFIG.REQUEST_TIMEOUT): Promise<unknown> {
  return servicioPredeterminado.fetchEndpoint(endpoint, timeout);
}

export function getNtsLiveData(timeout: number = DEFAULT_CONFIG.REQUEST_TIMEOUT): Promise<unknown> {
  return servicioPredeterminado.getLiveData(timeout);
}

export function getNtsMixtapesData(timeout: number = DEFAULT_CONFIG.REQUEST_TIMEOUT): Promise<unknown> {
  return servicioPredeterminado.getMixtapesData(timeout);
}

/**
 * Lo que suena ahora en cada canal de NTS
 */
export function getCurrentBroadcasts(timeout: number = DEFAULT_CONFIG.REQUEST_TIMEOUT): Promise<Broadcast[]> {
  return servicioPredeterminado.getCurrentBroadcasts(timeout);
}

export function getNextBroadcasts(timeout: number = DEFAULT_CONFIG.REQUEST_TIMEOUT): Promise<Broadcast[]> {
  return servicioPredeterminado.getNextBroadcasts(timeout);
}

/**
 * Mixtapes disponibles, con búsqueda por alias en `byAlias`
 */
export function getMixtapes(timeout: number = DEFAULT_CONFIG.REQUEST_TIMEOUT): Promise<MixtapeList> {
  return servicioPredeterminado.getMixtapes(timeout);
}
