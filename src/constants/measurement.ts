/**
 * Constantes du moteur de mesure
 */

// Bornes du zoom (scale image → écran)
export const MIN_SCALE = 0.05;
export const MAX_SCALE = 80.0;

// Rayon de recherche du snap, exprimé en pixels écran (converti en pixels image au zoom courant)
export const SNAP_RADIUS_SCREEN = 12;

// Score de gradient minimal (L1 horizontal + vertical) pour accepter un snap
export const SNAP_MIN_SCORE = 24;

// Déplacement minimal (px image) pour signaler un snap effectif
export const SNAP_FEEDBACK_MIN_PX = 0.1;

// Deux clics plus proches que ce seuil sont considérés comme le même point
export const SAME_POINT_EPSILON = 1e-4;

// Chiffres significatifs affichés
export const DISPLAY_DIGITS = 4;

// Nombre de mesures dessinées (CSV et sauvegarde gardent tout)
export const MAX_VISIBLE_RESULTS = 120;

/** Délai de regroupement des écritures d'autosave (ms) */
export const AUTOSAVE_DEBOUNCE_MS = 900;

export const HISTORY_LIMIT = 100;

export const PROJECT_VERSION = 1;
export const PROJECT_EXTENSION = 'pxcal';
export const AUTOSAVE_FILE_NAME = `last-project.${PROJECT_EXTENSION}`;

export const DEFAULT_UNIT = 'µm';

// Tailles de canvas en dessous de ce seuil (layout en cours) sont ignorées
export const MIN_CANVAS_SIDE = 10;
// Variation de taille de canvas considérée comme nulle
export const CANVAS_RESIZE_EPS = 0.5;

export const IMAGE_EXTENSIONS = [
  'png',
  'jpg',
  'jpeg',
  'tif',
  'tiff',
  'bmp',
  'gif',
  'webp',
  'heic',
  'heif',
] as const;

export const PREFS_KEYS = {
  rounding: 'caliper.prefs.rounding',
  continuous: 'caliper.prefs.continuous',
  snap: 'caliper.prefs.snap',
} as const;
