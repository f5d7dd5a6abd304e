// Comment-section vocabulary for video and music channels.

/** AFINN extras: slang the stock list lacks or reads the wrong way round. */
export const socialLexicon: Record<string, number> = {
  // Slang
  'fire': 3,
  'lit': 3,
  'goat': 4,
  'banger': 3,
  'slaps': 3,
  'bop': 3,
  'iconic': 3,
  'masterpiece': 4,
  'sick': 2,
  'insane': 2,
  'crazy': 1,
  'killer': 2,
  'unreal': 2,
  'trash': -3,
  'mid': -2,
  'cringe': -2,
  'flop': -3,
  'overrated': -2,
  'clickbait': -3,
  'snooze': -2,
  'garbage': -3,
};

/** Words plain English scores negatively that fans use as praise. */
export const misreadSlang: readonly string[] = [
  'fire',
  'sick',
  'insane',
  'crazy',
  'killer',
  'unreal',
];

export const positivePhrases: readonly string[] = [
  'on repeat',
  'goes hard',
  'hits different',
  'chills',
  'goosebumps',
  'underrated',
  'well done',
  'so good',
  'vibes',
];

export const negativePhrases: readonly string[] = [
  'fell off',
  'waste of time',
  'skip',
  'unsubscribed',
  'unsubscribing',
  'sold out',
  'so bad',
  'same loop',
];

export const negators: ReadonlySet<string> = new Set([
  'not',
  'no',
  'never',
  "isn't",
  "ain't",
  "wasn't",
  "don't",
  "doesn't",
  'isnt',
  'aint',
  'dont',
]);

export const positiveEmoji: readonly string[] = ['🔥', '😍', '❤', '💯', '🙌', '👏', '🥰', '🤩', '👍', '🎉', '🐐'];

export const negativeEmoji: readonly string[] = ['👎', '😡', '🤮', '💩', '😒', '🙄', '😴', '🤢', '😤'];

export const questionStarters: readonly string[] = [
  'who', 'what', 'when', 'where', 'why', 'how',
  'is', 'are', 'does', 'do', 'did', 'can', 'could', 'will', 'would',
];
