/**
 * Detection rule table: each rule pairs a base condition with exactly one
 * conflicting statement group. A rule fires only when both groups match.
 * Built once at module load, frozen, never written afterwards.
 */

import { RE2JS } from 're2js';
import type { AnomalyType, SeverityLevel } from '../types.js';

/** RE2 automaton: search time is linear in the input, with no backtracking. */
export type Pattern = RE2JS;

export type ConflictGroup =
  | { kind: 'instruction'; patterns: readonly Pattern[] }
  | { kind: 'conclusion'; patterns: readonly Pattern[] }
  | { kind: 'conflict'; patterns: readonly Pattern[] }
  | { kind: 'value'; patterns: readonly Pattern[] };

export interface AnomalyTemplate {
  readonly type: AnomalyType;
  readonly severity: SeverityLevel;
  readonly title: string;
  readonly description: string;
  readonly evidence: readonly string[];
  readonly recommendation: string;
  readonly protocolReference?: string;
}

export interface DetectionRule {
  readonly id: string;
  readonly basePatterns: readonly Pattern[];
  readonly conflictGroup: ConflictGroup;
  readonly anomaly: AnomalyTemplate;
}

export class RuleDefinitionError extends Error {
  constructor(ruleId: string, problem: string) {
    super(`Invalid detection rule "${ruleId}": ${problem}`);
    this.name = 'RuleDefinitionError';
  }
}

// RE2 folds case over Unicode (š/Š, đ/Đ, ž/Ž).
export function compilePattern(source: string): Pattern {
  return RE2JS.compile(source, RE2JS.CASE_INSENSITIVE);
}

const rx = compilePattern;

const POSITIVE_CONCLUSION = ['dobr.*praks', 'u skladu', 'pravilno', 'adekvatn'];

const RULES: DetectionRule[] = [
  {
    id: 'blind_patient_visual_instruction',
    basePatterns: ['retinopat', 'slep', 'vid.*o[sš]te[cć]en', 'h36\\.0', 'dijabeti.*retinopat'].map(rx),
    conflictGroup: {
      kind: 'instruction',
      patterns: [
        'upi[sš]',
        'pis(ati|uje|e|i)',
        '[cč]ita',
        'bele[zž]i',
        'evidentira',
        'meri(ti)?.*glikemij',
        'javi(ti)?.*lekar',
      ].map(rx),
    },
    anomaly: {
      type: 'impossible_instruction',
      severity: 'critical',
      title: 'Nemoguće uputstvo - zahteva vid kod slepog pacijenta',
      description:
        'Dokumentacija sadrži uputstvo koje zahteva vid (čitanje/pisanje vrednosti), ' +
        'ali pacijent ima dijagnostifikovano teško oštećenje vida ili slepoću (retinopatija).',
      evidence: [
        'Dijagnoza: H36.0 (Retinopathia diabetica) ili ekvivalent',
        'Uputstvo zahteva vizuelnu aktivnost (čitanje, pisanje, beleženje)',
      ],
      recommendation:
        'Obezbediti asistenciju treće osobe ili govorni glukometar sa audio povratnom informacijom. ' +
        'Alternativno: CGM (kontinuirani monitoring glukoze) sa alarmima.',
      protocolReference: 'Vodič za dijabetes Batuta 2023, Sekcija 4.2 - Prilagođavanje terapije',
    },
  },
  {
    id: 'hypoglycemia_good_practice',
    basePatterns: [
      'glikemij.*[0-2][.,][0-9]',
      'glukoz.*[0-2][.,][0-9]',
      '[0-2][.,][0-9]\\s*mmol',
      'hipoglikemij',
    ].map(rx),
    conflictGroup: {
      kind: 'conclusion',
      patterns: [...POSITIVE_CONCLUSION, 'bez propust'].map(rx),
    },
    anomaly: {
      type: 'logical_inconsistency',
      severity: 'critical',
      title: "Logička nekonzistentnost - opasna hipoglikemija opisana kao 'dobra praksa'",
      description:
        'Dokumentacija navodi kritično nisku glikemiju (< 2.2 mmol/L je ozbiljna hipoglikemija), ' +
        'ali zaključak tvrdi da je postupanje bilo u skladu sa dobrom praksom.',
      evidence: ['Glikemija ispod kritičnog praga (< 2.2 mmol/L)', 'Zaključak pozitivno ocenjuje postupanje'],
      recommendation:
        'Revidirati zaključak. Prema Vodiču Batuta, glikemija < 2.2 mmol/L zahteva ' +
        'hitnu intervenciju. Ako je pacijent na dugom insulinu, neophodna je hospitalizacija.',
      protocolReference: 'Vodič Batuta za prehospitalna urgentna stanja, Hipoglikemija',
    },
  },
  {
    id: 'care_not_provided_good_practice',
    basePatterns: ['nega.*nije.*obezbe[dđ]', 'nije.*obezbe[dđ].*nega', 'bez.*nege', 'nega.*nedostup'].map(rx),
    conflictGroup: {
      kind: 'conclusion',
      patterns: POSITIVE_CONCLUSION.map(rx),
    },
    anomaly: {
      type: 'logical_inconsistency',
      severity: 'critical',
      title: "Kontradikcija - 'nega nije obezbeđena' + 'dobra praksa'",
      description:
        'Dokumentacija eksplicitno navodi da nega nije obezbeđena, ' +
        'ali zaključak ocenjuje postupanje kao ispravno.',
      evidence: ["Izjava: 'nega nije obezbeđena' (ili ekvivalent)", 'Zaključak: pozitivna ocena postupanja'],
      recommendation:
        'Uskladiti zaključak sa činjeničnim stanjem. Ako nega zaista nije bila ' +
        "obezbeđena, to ne može biti 'dobra praksa' prema bilo kom standardu.",
    },
  },
  {
    id: 'relative_care_lives_alone',
    basePatterns: [
      'sestra.*vodi.*ra[cč]un',
      '[cč]lan.*porodic.*brin',
      'srodnik.*obezbe[dđ]',
      'suprug.*poma[zž]',
    ].map(rx),
    conflictGroup: {
      kind: 'conflict',
      patterns: ['[zž]ivi\\s+sam', 'nema.*srodnik', 'usamljen', 'bez.*porodic', 'samo.*[zž]ivi'].map(rx),
    },
    anomaly: {
      type: 'data_conflict',
      severity: 'warning',
      title: 'Konflikt podataka - navedena nega vs. socijalni status',
      description:
        'Medicinska dokumentacija navodi da će se član porodice/srodnik brinuti o pacijentu, ' +
        'ali socijalni podaci ukazuju da pacijent živi sam ili nema dostupne srodnike.',
      evidence: ['Otpusna lista/plan: srodnik će se brinuti', 'Socijalni karton: živi sam/nema srodnika u mestu'],
      recommendation:
        'Verifikovati stvarno stanje pre otpusta. Ako pacijent zaista živi sam, ' +
        'organizovati kućnu negu ili razmotriti produženi boravak.',
    },
  },
  {
    id: 'discharge_with_low_glucose',
    basePatterns: ['otpu[sš]t.*sa.*gluk', 'otpu[sš]t.*sa.*glikemij'].map(rx),
    conflictGroup: {
      kind: 'value',
      patterns: ['[0-3][.,][0-9]\\s*mmol', 'glu.*[0-3][.,][0-9]'].map(rx),
    },
    anomaly: {
      type: 'protocol_violation',
      severity: 'critical',
      title: 'Kršenje protokola - otpust sa kritičnom glikemijom',
      description:
        'Pacijent je otpušten sa glikemijom koja je ispod bezbednog praga. ' +
        'Prema protokolu, glikemija mora biti stabilizovana pre otpusta.',
      evidence: ['Vrednost glikemije pri otpustu ispod 4.0 mmol/L'],
      recommendation:
        'Pacijent sa glikemijom < 4.0 mmol/L ne bi trebalo da bude otpušten ' +
        'dok se vrednosti ne stabilizuju iznad 5.0 mmol/L tokom najmanje 2 sata.',
      protocolReference: 'ADA Standards of Care 2024, Sekcija 6 - Hospitalizovani pacijenti',
    },
  },
];

export function validateRuleTable(rules: readonly DetectionRule[]): void {
  const seen = new Set<string>();
  for (const rule of rules) {
    if (seen.has(rule.id)) throw new RuleDefinitionError(rule.id, 'duplicate id');
    seen.add(rule.id);
    if (rule.basePatterns.length === 0) throw new RuleDefinitionError(rule.id, 'no base patterns');
    if (rule.conflictGroup.patterns.length === 0) {
      throw new RuleDefinitionError(rule.id, `empty ${rule.conflictGroup.kind} group`);
    }
    const patterns = [...rule.basePatterns, ...rule.conflictGroup.patterns];
    if (patterns.some((p) => (p.flags() & RE2JS.CASE_INSENSITIVE) === 0)) {
      throw new RuleDefinitionError(rule.id, 'patterns must be case-insensitive');
    }
    if (rule.anomaly.evidence.length === 0) throw new RuleDefinitionError(rule.id, 'no evidence');
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !(value instanceof RE2JS) && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

validateRuleTable(RULES);

export const DETECTION_RULES: readonly DetectionRule[] = deepFreeze(RULES);
