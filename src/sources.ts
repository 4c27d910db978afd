// Football communities the keyword search runs across when no sources are given
export const DEFAULT_SOURCES = [
  'PremierLeague',
  'soccer',
  'football',
  'LaLiga',
  'Bundesliga',
  'seriea',
  'Ligue1',
  'MLS',
];
