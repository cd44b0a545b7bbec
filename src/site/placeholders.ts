/**
 * Fixed placeholder copy and images used by the homepage layouts
 */

export interface PlaceholderCard {
  title: string;
  text: string;
}

export interface HeroMetric {
  value: string;
  label: string;
}

export const HERO_STATEMENT: PlaceholderCard = {
  title: 'Dynamic systems, grounded experiments',
  text: 'Placeholder for a concise, compelling statement about the work.',
};

export const HERO_METRICS: readonly HeroMetric[] = [
  { value: '12+', label: 'Active research threads' },
  { value: '4', label: 'Collaborating labs' },
  { value: '20', label: 'Years of history' },
];

export const PROFILE_ART_TITLE = 'Profile';

export const PROFILE_CARDS: readonly PlaceholderCard[] = [
  { title: 'Core questions', text: 'Placeholder for the core questions behind the work.' },
  { title: 'Methods', text: 'Placeholder for modeling, experimentation, and field work.' },
  { title: 'Community', text: 'Placeholder for seminars, visitors, and collaborations.' },
];

export const SELECTED_OUTPUTS_TITLE = 'Selected outputs';

export const SELECTED_OUTPUTS: readonly string[] = [
  'Placeholder output: paper, dataset, or public demonstration.',
  'Placeholder output: workshop, symposium, or lecture series.',
  'Placeholder output: open-source tool or platform.',
];

export const DEFAULT_HERO_IMAGE = 'placeholder-hero.svg';

/** File name -> accessible label; each is written to assets/img as an SVG */
export const PLACEHOLDER_IMAGES: Readonly<Record<string, string>> = {
  'placeholder-hero.svg': 'Warm abstract hero placeholder',
  'placeholder-studio.svg': 'Studio placeholder',
  'placeholder-lab.svg': 'Lab placeholder',
  'placeholder-portrait.svg': 'Portrait placeholder',
  'placeholder-grid.svg': 'Project grid placeholder',
};
