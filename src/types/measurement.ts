// Types de base pour le moteur de mesure (V1)

export type Px = number; // pixels image (réel)
export type SessionID = string;
export type MeasurementID = number;

export type Point = { readonly x: Px; readonly y: Px };

export type Size = { w: number; h: number };

export type Measurement = {
  readonly id: MeasurementID; // unique par session, jamais réutilisé
  readonly p1: Point;
  readonly p2: Point;
  readonly pixelLength: Px;
  readonly createdAt: string; // ISO
};

export type Calibration = {
  unit: string; // ex: "µm"
  unitsPerPixel: number; // > 0
};

/** image → écran : screen = image * scale + t */
export type ViewTransform = {
  scale: number;
  tx: number;
  ty: number;
};

export type MeasureMode = 'idle' | 'measure' | 'scale';

export type RoundingMode = 'round' | 'ceil';

export type ImageSession = {
  id: SessionID;
  name: string; // nom de fichier affiché
  imagePath: string | null; // null pour une image sans fichier (collée)
  pixelSize: Size;
  transform: ViewTransform;
  hasCustomTransform: boolean;
  calibration?: Calibration;
  results: Measurement[]; // plus récent en tête
  nextResultID: MeasurementID;
};

/**
 * Raster RGBA 8 bits (même disposition que ImageData.data).
 * Fourni par l'ImageProvider, jamais stocké dans le state du store.
 */
export type RasterImage = {
  width: number;
  height: number;
  data: Uint8ClampedArray;
};
