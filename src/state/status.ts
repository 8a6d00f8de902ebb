// Messages de statut affichés par l'hôte (barre d'état)

import type { MeasureMode } from '@/types/measurement';

export const MODE_LABELS: Record<MeasureMode, string> = {
  idle: 'Normal',
  measure: 'Mesure',
  scale: 'Échelle',
};

export const UNDO_LABELS = {
  add: 'Ajout de mesure',
  cancelLast: 'Annulation de mesure',
  remove: 'Suppression de mesure',
  clear: 'Suppression des mesures',
} as const;

export const STATUS = {
  ready: 'Prêt : ouvrir une image → définir l’échelle si besoin → mesurer',
  newProject: 'Nouveau projet démarré.',
  scaleSecondPoint: 'Échelle : cliquer le 2e point → saisir la longueur réelle',
  measureSecondPoint: 'Mesure : cliquer le 2e point pour valider / Échap pour revenir',
  samePoint: 'Points identiques. Recommencez.',
  scaleEnterValue: 'Saisissez la valeur d’échelle.',
  scaleInvalid: 'Valeur d’échelle invalide.',
  scaleCancelled: 'Saisie d’échelle annulée.',
  cancelPending: 'Annulé : points en cours effacés.',
  nothingToCancel: 'Annulé : rien à annuler.',
  cleared: 'Mesures de l’image courante supprimées.',
  viewReset: 'Vue réinitialisée.',
  loadNoImages: 'Erreur de chargement : aucun fichier lisible.',
  folderEmpty: 'Aucune image trouvée dans le dossier.',
  folderUnreadable: 'Dossier illisible.',
  csvCurrent: 'CSV copié : image courante.',
  nothingToCopy: 'Rien à copier.',
  nothingToSave: 'Rien à enregistrer.',
  saveFailed: 'Échec de l’enregistrement du projet.',
  loadFailed: 'Échec du chargement du projet.',
  loadMissingImages: 'Chargement impossible : fichiers image introuvables.',
  exportFailed: 'Échec de l’enregistrement de l’image.',
  exportUnavailable: 'Export d’image indisponible.',
} as const;

export const statusMessages = {
  imagesAdded: (n: number) => `${n} image(s) ajoutée(s).`,
  sessionSwitched: (name: string) => `Image : ${name}`,
  measurementAdded: (length: string, continuous: boolean) =>
    continuous ? `Mesure ajoutée : ${length} (mesure continue)` : `Mesure ajoutée : ${length}`,
  scaleConfirmed: (scale: string) => `Échelle définie : ${scale}`,
  measurementCancelled: (id: number) => `Annulé : #${id} retirée.`,
  roundingChanged: (mode: 'round' | 'ceil') =>
    `Arrondi : ${mode === 'round' ? 'au plus proche' : 'supérieur'}.`,
  continuousChanged: (on: boolean) => `Mesure continue ${on ? 'activée' : 'désactivée'}.`,
  snapChanged: (on: boolean) => `Accroche aux bords ${on ? 'activée' : 'désactivée'}.`,
  csvAll: (columns: number) => `CSV copié : ${columns} colonne(s).`,
  projectSaved: (name: string) => `Projet enregistré : ${name}`,
  projectLoaded: (count: number, missing: number) =>
    missing === 0
      ? `Projet chargé : ${count} image(s).`
      : `Projet chargé : ${count} image(s) (manquants : ${missing})`,
  autosaveRestored: (count: number) => `Session précédente restaurée (${count} image(s)).`,
  imageExported: (name: string) => `Image enregistrée : ${name}`,
  imagesExported: (count: number) => `${count} image(s) enregistrée(s).`,
};
