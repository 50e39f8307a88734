import { SeverityLevel, type SeverityColor } from '../types.js';

const SEVERE_KEYWORDS = ['thunder', 'tornado', 'hurricane', 'extreme'];
const MODERATE_KEYWORDS = ['rain', 'snow', 'sleet', 'storm', 'shower', 'mist', 'haze', 'fog'];

const SEVERITY_COLORS: Record<SeverityLevel, SeverityColor> = {
  [SeverityLevel.GOOD]: 'green',
  [SeverityLevel.MODERATE]: 'blue',
  [SeverityLevel.SEVERE]: 'red',
};

const SEVERITY_LABELS: Record<SeverityLevel, string> = {
  [SeverityLevel.GOOD]: 'Good',
  [SeverityLevel.MODERATE]: 'Moderate',
  [SeverityLevel.SEVERE]: 'Harsh',
};

export const SEVERITY_LEGEND: ReadonlyArray<{ label: string; color: SeverityColor }> = [
  { label: 'Good', color: 'green' },
  { label: 'Rain / Fog', color: 'blue' },
  { label: 'Severe', color: 'red' },
];

// Severe keywords are checked first: "thunderstorm" must not fall through to "storm".
export const classifySeverity = (description: string | null | undefined): SeverityLevel => {
  const normalized = String(description || '').toLowerCase();
  if (SEVERE_KEYWORDS.some((keyword) => normalized.includes(keyword))) {
    return SeverityLevel.SEVERE;
  }
  if (MODERATE_KEYWORDS.some((keyword) => normalized.includes(keyword))) {
    return SeverityLevel.MODERATE;
  }
  return SeverityLevel.GOOD;
};

export const getHigherSeverity = (sevA: SeverityLevel, sevB: SeverityLevel): SeverityLevel => (sevA >= sevB ? sevA : sevB);

export const worstSeverity = (levels: Iterable<SeverityLevel>): SeverityLevel => {
  let worst: SeverityLevel = SeverityLevel.GOOD;
  for (const level of levels) {
    worst = getHigherSeverity(worst, level);
  }
  return worst;
};

export const severityColor = (level: SeverityLevel): SeverityColor => SEVERITY_COLORS[level];

export const severityLabel = (level: SeverityLevel): string => SEVERITY_LABELS[level];
