/**
 * Configuración por defecto del cliente y del CLI
 */
export const DEFAULT_CONFIG = {
  // API pública de NTS
  API_BASE_URL: 'https://www.nts.live/api/v2',

  ENDPOINTS: {
    LIVE: 'live',
    MIXTAPES: 'mixtapes'
  },

  // Timeouts
  REQUEST_TIMEOUT: 10000,

  // Cuántos créditos se listan por mixtape antes de resumir
  MAX_CREDITS_SHOWN: 5
} as const;

/**
 * Mensajes del CLI
 */
export const HELP_MESSAGES = {
  WELCOME: '📻 NTS Radio desde la terminal',
  DESCRIPTION: 'Qué suena ahora en los canales en vivo y qué mixtapes hay disponibles',
  LOADING_LIVE: 'Consultando los canales en vivo...',
  LOADING_MIXTAPES: 'Consultando las mixtapes...',
  LIVE_HEADER: 'Canales en vivo',
  MIXTAPES_HEADER: 'Mixtapes'
} as const;
