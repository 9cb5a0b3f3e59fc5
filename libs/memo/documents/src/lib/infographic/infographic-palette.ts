export interface CardStyle {
  icon: string;
  borderClass: string;
  backgroundClass: string;
}

/** Card styles cycled by section index */
export const CARD_PALETTE: readonly CardStyle[] = [
  { icon: '💼', borderClass: 'border-blue-600', backgroundClass: 'bg-blue-50' },
  { icon: '🏢', borderClass: 'border-sky-600', backgroundClass: 'bg-sky-50' },
  { icon: '🌐', borderClass: 'border-indigo-600', backgroundClass: 'bg-indigo-50' },
  { icon: '🧩', borderClass: 'border-purple-600', backgroundClass: 'bg-purple-50' },
  { icon: '📊', borderClass: 'border-green-600', backgroundClass: 'bg-green-50' },
  { icon: '📈', borderClass: 'border-emerald-600', backgroundClass: 'bg-emerald-50' },
  { icon: '👥', borderClass: 'border-yellow-600', backgroundClass: 'bg-yellow-50' },
  { icon: '⚠️', borderClass: 'border-red-600', backgroundClass: 'bg-red-50' },
  { icon: '💡', borderClass: 'border-pink-600', backgroundClass: 'bg-pink-50' },
  { icon: '🧠', borderClass: 'border-gray-600', backgroundClass: 'bg-gray-50' },
];

export const cardStyleFor = (index: number): CardStyle => CARD_PALETTE[index % CARD_PALETTE.length];
