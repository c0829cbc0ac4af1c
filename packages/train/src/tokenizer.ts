/**
 * Word-level tokenizer for the policy vocabulary.
 *
 * Words are lowercased letter/number runs; sentence punctuation is kept as
 * its own token. Id 0 is the beginning-of-sequence marker `<s>` and id 1 the
 * unknown-word marker `<unk>`.
 */
import { Effect } from "effect";
import { ModelError, type Tokenizer } from "@rubric/core";

export const BOS = "<s>";
export const UNK = "<unk>";

const TOKEN_RE = /[\p{L}\p{N}]+(?:['’][\p{L}\p{N}]+)*|[.,!?;:]/gu;

export function splitWords(text: string): string[] {
  return text.toLowerCase().match(TOKEN_RE) ?? [];
}

export class WordTokenizer implements Tokenizer {
  readonly name = "word";

  /** Vocabulary in id order; the two markers come first. */
  private _vocab: string[] = [BOS, UNK];

  /** word -> token id */
  private _stoi = new Map<string, number>([
    [BOS, 0],
    [UNK, 1],
  ]);

  get vocabSize(): number {
    return this._vocab.length;
  }

  get vocab(): readonly string[] {
    return this._vocab;
  }

  /**
   * Build the vocabulary from a corpus. With `maxWords`, only the most
   * frequent words are kept (ties broken alphabetically); the kept words are
   * sorted.
   */
  build(corpus: readonly string[], maxWords?: number): Effect.Effect<readonly string[], ModelError> {
    return Effect.try({
      try: () => {
        const counts = new Map<string, number>();
        for (const text of corpus) {
          for (const w of splitWords(text)) counts.set(w, (counts.get(w) ?? 0) + 1);
        }
        counts.delete(BOS);
        counts.delete(UNK);
        if (counts.size === 0) throw new Error("Cannot build word tokenizer from an empty corpus");
        let words = [...counts.keys()];
        if (maxWords !== undefined && words.length > maxWords) {
          words = [...counts.entries()]
            .sort(([a, ca], [b, cb]) => cb - ca || (a < b ? -1 : a > b ? 1 : 0))
            .slice(0, maxWords)
            .map(([w]) => w);
        }
        this._setVocab([BOS, UNK, ...words.sort()]);
        return this._vocab;
      },
      catch: (cause) => new ModelError({ message: `Tokenizer build failed: ${cause instanceof Error ? cause.message : String(cause)}`, cause }),
    });
  }

  /** Unknown words map to `<unk>`. */
  encode(text: string): Int32Array {
    return new Int32Array(splitWords(text).map((w) => this._stoi.get(w) ?? 1));
  }

  /** Joins words with spaces and attaches punctuation to the preceding word. */
  decode(tokens: ArrayLike<number>): string {
    const parts: string[] = [];
    for (let i = 0; i < tokens.length; i++) {
      const id = tokens[i];
      if (id === 0) continue;
      const word = this._vocab[id];
      if (word !== undefined) parts.push(word);
    }
    return parts.join(" ").replace(/ ([.,!?;:])/g, "$1");
  }

  /** Re-initialise from a saved vocabulary. */
  loadVocab(vocab: readonly string[]): void {
    if (vocab[0] !== BOS || vocab[1] !== UNK) {
      throw new ModelError({ message: `Vocabulary must start with ${BOS} and ${UNK}` });
    }
    this._setVocab([...vocab]);
  }

  private _setVocab(words: string[]): void {
    this._vocab = words;
    this._stoi.clear();
    for (let i = 0; i < words.length; i++) this._stoi.set(words[i], i);
  }
}
