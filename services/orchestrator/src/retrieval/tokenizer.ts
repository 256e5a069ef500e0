/**
 * Tokenizer
 * CJK-bigram analyzer shared by lexical indexing and query scoring.
 *
 * Latin letters and digits form lowercase word tokens. Each contiguous run of
 * Han characters yields its overlapping character bigrams (a one-character
 * run yields the character). Everything else separates tokens.
 */

export type Tokenizer = (text: string) => string[];

const HAN = /\p{Script=Han}/u;
const WORD_CHAR = /[\p{L}\p{N}]/u;

function pushHanRun(run: string[], tokens: string[]): void {
  const [first] = run;
  if (run.length === 1 && first !== undefined) {
    tokens.push(first);
    return;
  }
  for (let i = 0; i < run.length - 1; i++) {
    tokens.push(`${run[i]}${run[i + 1]}`);
  }
}

export const tokenize: Tokenizer = (text) => {
  const tokens: string[] = [];
  let word = '';
  let hanRun: string[] = [];

  const flushWord = () => {
    if (word) {
      tokens.push(word);
      word = '';
    }
  };
  const flushHan = () => {
    if (hanRun.length > 0) {
      pushHanRun(hanRun, tokens);
      hanRun = [];
    }
  };

  for (const ch of text) {
    if (HAN.test(ch)) {
      flushWord();
      hanRun.push(ch);
    } else if (WORD_CHAR.test(ch)) {
      flushHan();
      word += ch.toLowerCase();
    } else {
      flushWord();
      flushHan();
    }
  }

  flushWord();
  flushHan();
  return tokens;
};
