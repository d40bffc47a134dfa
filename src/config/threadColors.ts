// English → Spanish thread colour names used on production labels.
export type ThreadColorDictionary = Readonly<Record<string, string>>;

export const THREAD_COLOR_ES: ThreadColorDictionary = Object.freeze({
  White: 'Blanco',
  Black: 'Negro',
  Gold: 'Dorado',
  Silver: 'Plateado',
  Red: 'Rojo',
  Blue: 'Azul',
  Navy: 'Azul Marino',
  'Light Blue': 'Azul Claro',
  'Mid Blue': 'Azul Medio',
  Green: 'Verde',
  Pink: 'Rosa',
  'Hot Pink': 'Rosa Fucsia',
  Lilac: 'Lila',
  Purple: 'Morado',
  Yellow: 'Amarillo',
  Beige: 'Beige',
  Brown: 'Marrón',
  Gray: 'Gris',
  Grey: 'Gris',
  'Light Grey': 'Gris Claro',
  'Dark Grey': 'Gris Oscuro',
  Orange: 'Naranja',
  Teal: 'Verde Azulado',
  Ivory: 'Marfil',
  Champagne: 'Champán',
  Aqua: 'Aguamarina',
});
