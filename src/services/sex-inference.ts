/**
 * Sex inference from a first name.
 *
 * The analytics schema stores an inferred value per patient. How it is
 * inferred is pluggable. The default checks a bundled list of regional names
 * and then the gender-detection-from-name dataset.
 */

import { getGender } from 'gender-detection-from-name';
import firstNames from '../../data/first-names.json';
import { Logger } from '../lib/error-handler';

export type InferredSex = 'male' | 'female' | 'unisex';

export interface SexInferrer {
  /**
   * Returns null when the name gives no answer.
   */
  infer(firstName: string): InferredSex | null;
}

export interface FirstNameDictionary {
  male: readonly string[];
  female: readonly string[];
  unisex: readonly string[];
}

function canonicalName(name: string): string {
  return name
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .trim()
    .toUpperCase();
}

export class DictionarySexInferrer implements SexInferrer {
  private readonly index = new Map<string, InferredSex>();

  constructor(dictionary: FirstNameDictionary = firstNames) {
    // unisex last so it wins over a name listed in both columns
    for (const name of dictionary.male) this.index.set(canonicalName(name), 'male');
    for (const name of dictionary.female) this.index.set(canonicalName(name), 'female');
    for (const name of dictionary.unisex) this.index.set(canonicalName(name), 'unisex');
  }

  infer(firstName: string): InferredSex | null {
    const key = canonicalName(firstName);
    if (key === '') {
      return null;
    }
    return this.index.get(key) ?? null;
  }

  get size(): number {
    return this.index.size;
  }
}

export type DatasetLanguage = NonNullable<Parameters<typeof getGender>[1]>;

/**
 * Spellings tried against the dataset: as written, then without accents
 */
function datasetSpellings(name: string): string[] {
  const written = name.trim().toLowerCase();
  if (written === '') {
    return [];
  }
  const folded = canonicalName(written).toLowerCase();
  return folded === written ? [written] : [written, folded];
}

/**
 * Regional list first, then the published dataset for each language in order.
 * Unisex answers come only from the regional list.
 */
export class NameDatasetSexInferrer implements SexInferrer {
  private readonly regional: DictionarySexInferrer;

  constructor(
    private readonly languages: readonly DatasetLanguage[] = ['es', 'en'],
    regionalNames: FirstNameDictionary = firstNames
  ) {
    this.regional = new DictionarySexInferrer(regionalNames);
  }

  infer(firstName: string): InferredSex | null {
    const regional = this.regional.infer(firstName);
    if (regional !== null) {
      return regional;
    }

    const spellings = datasetSpellings(firstName);
    for (const language of this.languages) {
      for (const spelling of spellings) {
        const gender = getGender(spelling, language);
        if (gender === 'male' || gender === 'female') {
          return gender;
        }
      }
    }
    return null;
  }
}

/**
 * Run an inferrer without letting its failures escape. A thrown error is
 * logged and reported as an absent value.
 */
export function safeInferSex(inferrer: SexInferrer, firstName: string, logger: Logger): InferredSex | null {
  if (firstName === '') {
    return null;
  }

  try {
    return inferrer.infer(firstName);
  } catch (error) {
    logger.warn(`Sex inference failed for '${firstName}'`, {
      first_name: firstName,
      error_message: error instanceof Error ? error.message : String(error)
    });
    return null;
  }
}
