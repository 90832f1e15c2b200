export type FieldType = 'numeric' | 'string' | 'date';

export interface FieldDefinition {
  name: string;
  type: FieldType;
  description: string;
  /** Phrases that refer to this field in rule text, lower case. */
  aliases: string[];
  typical_range?: { min: number; max: number };
  unit?: string;
}

export const CATTLE_FIELDS: FieldDefinition[] = [
  {
    name: 'lot_id',
    type: 'string',
    description: 'Unique identifier of the lot within a batch',
    aliases: ['lot id', 'lot_id', 'lot number'],
  },
  {
    name: 'weight',
    type: 'numeric',
    description: 'Entry weight in pounds',
    aliases: ['entry weight', 'entry_weight', 'arrival weight', 'in weight', 'live weight', 'weight'],
    typical_range: { min: 400, max: 1500 },
    unit: 'lbs',
  },
  {
    name: 'exit_weight',
    type: 'numeric',
    description: 'Weight in pounds when leaving the lot',
    aliases: ['exit weight', 'exit_weight', 'out weight', 'final weight', 'ship weight'],
    typical_range: { min: 900, max: 1800 },
    unit: 'lbs',
  },
  {
    name: 'breed',
    type: 'string',
    description: 'Cattle breed',
    aliases: ['breed names', 'breed name', 'breeds', 'breed'],
  },
  {
    name: 'birth_date',
    type: 'date',
    description: 'Date of birth (YYYY-MM-DD)',
    aliases: ['birth dates', 'birth date', 'birth_date', 'date of birth', 'birthdate', 'dob'],
  },
  {
    name: 'health_status',
    type: 'string',
    description: 'Health condition',
    aliases: ['health status', 'health_status', 'health'],
  },
  {
    name: 'feed_type',
    type: 'string',
    description: 'Ration fed to the lot',
    aliases: ['feed type', 'feed_type', 'ration'],
  },
  {
    name: 'days_on_feed',
    type: 'numeric',
    description: 'Number of days the cattle spent on feed',
    aliases: ['days on feed', 'days_on_feed', 'dof'],
    typical_range: { min: 0, max: 365 },
  },
  {
    name: 'feed_conversion_ratio',
    type: 'numeric',
    description: 'Pounds of feed per pound of gain',
    aliases: ['feed conversion ratio', 'feed_conversion_ratio', 'feed conversion', 'fcr'],
    typical_range: { min: 4, max: 10 },
  },
  {
    name: 'head_count',
    type: 'numeric',
    description: 'Number of animals in the lot',
    aliases: ['head count', 'head_count', 'headcount'],
  },
  {
    name: 'sex',
    type: 'string',
    description: 'Steer, heifer, bull or cow',
    aliases: ['sex', 'gender'],
  },
];

export interface FieldMention {
  field: FieldDefinition;
  alias: string;
  index: number;
}

export class FieldSchema {
  private readonly byName = new Map<string, FieldDefinition>();
  private readonly aliasIndex: Array<{ alias: string; field: FieldDefinition }>;

  constructor(fields: FieldDefinition[]) {
    for (const field of fields) {
      this.byName.set(field.name, field);
    }
    // Longest alias first so "entry weight" wins over "weight".
    this.aliasIndex = fields
      .flatMap((field) => field.aliases.map((alias) => ({ alias, field })))
      .sort((a, b) => b.alias.length - a.alias.length);
  }

  get(name: string): FieldDefinition | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  names(): string[] {
    return [...this.byName.keys()];
  }

  fields(): FieldDefinition[] {
    return [...this.byName.values()];
  }

  /**
   * Resolve a field name or a natural-language alias to its definition.
   */
  resolve(phrase: string): FieldDefinition | undefined {
    const normalized = phrase.trim().toLowerCase().replace(/\s+/g, ' ');
    const direct = this.byName.get(normalized);
    if (direct) return direct;
    return this.aliasIndex.find((entry) => entry.alias === normalized)?.field;
  }

  /**
   * Every non-overlapping field mention in `text`, in order of appearance.
   */
  findMentions(text: string): FieldMention[] {
    const lower = text.toLowerCase();
    const taken: Array<[number, number]> = [];
    const mentions: FieldMention[] = [];

    for (const { alias, field } of this.aliasIndex) {
      const pattern = new RegExp(`\\b${escapeRegExp(alias)}(?:s|es)?\\b`, 'g');
      for (const match of lower.matchAll(pattern)) {
        const start = match.index ?? 0;
        const end = start + match[0].length;
        if (taken.some(([s, e]) => start < e && end > s)) continue;
        taken.push([start, end]);
        mentions.push({ field, alias, index: start });
      }
    }

    return mentions.sort((a, b) => a.index - b.index);
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export const DEFAULT_FIELD_SCHEMA = new FieldSchema(CATTLE_FIELDS);
