const WORDS_PER_MINUTE = 225;

/** Minutes needed to read `content`, rounded up. */
export const calculateReadingTime = (content: string): number => {
  const wordCount = content.trim().split(/\s+/).filter(Boolean).length;
  return Math.ceil(wordCount / WORDS_PER_MINUTE);
};
