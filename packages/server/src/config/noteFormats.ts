import { NoteFormat } from '@clinical-scribe/shared';

export const NOT_MENTIONED = 'Not mentioned.';
export const TRANSCRIPT_PLACEHOLDER = '{{TRANSCRIPT}}';

export interface NoteField {
  label: string;
  hint?: string;        // prompt-only guidance printed after the label
  narrative?: boolean;  // the template fallback copies the transcript here
}

export interface NoteSection {
  heading: string;
  bullet?: boolean;     // field lines are written as "• Label:"
  fields?: NoteField[];
  guidance?: string[];  // prompt lines after the fields
  fallback?: string[];  // fixed lines the template fallback writes after the fields
}

/**
 * One definition per note format. The generation prompt, the template fallback
 * and the markdown beautifier all read their layout from here, so a new format
 * only needs a new entry.
 */
export interface NoteFormatDefinition {
  format: NoteFormat;
  title: string;
  noun: string;
  spacedTitle: boolean; // blank line between title and header fields
  instructions: string[];
  headerFields: NoteField[];
  sections: NoteSection[];
}

const ENCOUNTER_FIELDS: NoteField[] = [
  { label: 'Patient Name' },
  { label: 'DOB' },
  { label: 'Clinician' },
  { label: 'Date' },
];

const NO_EXAM_TELEHEALTH = 'No physical exam performed; assessment based on verbal report.';

const SOAP: NoteFormatDefinition = {
  format: NoteFormat.SOAP,
  title: 'SOAP NOTE',
  noun: 'SOAP note',
  spacedTitle: false,
  instructions: [
    'You are a medical documentation assistant.',
    'Convert the clinical transcript below into a concise, accurate and well-structured SOAP note.',
    'Only use information explicitly stated in the transcript.',
    'Do NOT add, infer or assume anything that was not said.',
    `If a section has no data in the transcript, write: "${NOT_MENTIONED}"`,
  ],
  headerFields: [
    ...ENCOUNTER_FIELDS,
    { label: 'Setting', hint: '(telemedicine / in-person) — based on transcript' },
  ],
  sections: [
    {
      heading: 'S – Subjective',
      bullet: true,
      fields: [
        { label: 'Chief Complaint' },
        { label: 'History of Present Illness', narrative: true },
        { label: 'Review of Systems (only items mentioned)' },
        { label: 'Past Medical History' },
        { label: 'Medications' },
        { label: 'Allergies' },
        { label: 'Family History' },
        { label: 'Social History' },
      ],
    },
    {
      heading: 'O – Objective',
      guidance: [
        '• Exam findings from transcript',
        `(If telehealth and no exam provided, write: "${NO_EXAM_TELEHEALTH}")`,
        '• Vitals if mentioned',
      ],
      fallback: [
        '• Exam findings from transcript',
        NO_EXAM_TELEHEALTH,
        '• Vitals if mentioned',
        NOT_MENTIONED,
      ],
    },
    {
      heading: 'A – Assessment',
      guidance: [
        '• List every assessment or concern the clinician explicitly stated in the transcript',
        '• Do NOT generate diagnoses that were not discussed',
      ],
      fallback: [`• ${NOT_MENTIONED}`],
    },
    {
      heading: 'P – Plan',
      guidance: [
        '• Diagnostics ordered or recommended',
        '• Treatments/medications advised',
        '• Work restrictions',
        '• Safety netting / follow-up advice',
      ],
      fallback: [`• ${NOT_MENTIONED}`],
    },
  ],
};

const HISTORY_AND_PHYSICAL: NoteFormatDefinition = {
  format: NoteFormat.HP,
  title: 'HISTORY & PHYSICAL (H&P)',
  noun: 'H&P note',
  spacedTitle: true,
  instructions: [
    'You are a medical documentation assistant.',
    'Convert the transcript below into a structured History & Physical (H&P) note.',
    'Use only information explicitly stated. Do NOT guess or add details.',
    `If a section is missing information, mark it as "${NOT_MENTIONED}"`,
  ],
  headerFields: [...ENCOUNTER_FIELDS, { label: 'Setting' }],
  sections: [
    {
      heading: 'HISTORY',
      fields: [
        { label: 'Chief Complaint' },
        { label: 'History of Present Illness', narrative: true },
        { label: 'Past Medical History' },
        { label: 'Past Surgical History' },
        { label: 'Medications' },
        { label: 'Allergies' },
        { label: 'Family History' },
        { label: 'Social History' },
        { label: 'Review of Systems' },
      ],
      guidance: ['(Only list items explicitly found in the transcript.)'],
    },
    {
      heading: 'PHYSICAL EXAM',
      guidance: ['• If no exam data exists, write: "Not performed in transcript."'],
      fallback: ['• Not performed in transcript.'],
    },
    {
      heading: 'ASSESSMENT',
      guidance: [
        '• Summarize the clinician’s diagnostic thinking exactly as discussed.',
        '• Do NOT generate new differentials unless mentioned.',
      ],
      fallback: [`• ${NOT_MENTIONED}`],
    },
    {
      heading: 'PLAN',
      guidance: [
        '• Document investigations ordered or recommended',
        '• Treatment recommendations',
        '• Follow-up instructions',
        '• Any disposition (e.g., clinic referral, ER recommendation)',
      ],
      fallback: [`• ${NOT_MENTIONED}`],
    },
  ],
};

export const NOTE_FORMATS: Record<NoteFormat, NoteFormatDefinition> = {
  [NoteFormat.SOAP]: SOAP,
  [NoteFormat.HP]: HISTORY_AND_PHYSICAL,
};

export function getNoteFormat(format: NoteFormat): NoteFormatDefinition {
  return NOTE_FORMATS[format];
}

export function fieldLine(section: Pick<NoteSection, 'bullet'>, field: NoteField, value: string): string {
  const line = value ? `${field.label}: ${value}` : `${field.label}:`;
  return section.bullet ? `• ${line}` : line;
}
