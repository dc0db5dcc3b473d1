/**
 * Enlace tipado que la API devuelve para descubrir recursos
 */
export interface Link {
  readonly rel: string;
  readonly href: string;
  readonly type: string;
}
