/**
 * Load warnings and "did you mean" suggestions for lookups
 */

/**
 * Calculate Levenshtein distance between two strings
 * Used for finding similar company names when a lookup misses
 */
function levenshteinDistance(str1: string, str2: string): number {
  const len1 = str1.length;
  const len2 = str2.length;
  const matrix: number[][] = [];

  for (let i = 0; i <= len1; i++) {
    matrix[i] = [i];
  }

  for (let j = 0; j <= len2; j++) {
    matrix[0][j] = j;
  }

  for (let i = 1; i <= len1; i++) {
    for (let j = 1; j <= len2; j++) {
      if (str1[i - 1] === str2[j - 1]) {
        matrix[i][j] = matrix[i - 1][j - 1];
      } else {
        matrix[i][j] = Math.min(
          matrix[i - 1][j - 1] + 1, // substitution
          matrix[i][j - 1] + 1,     // insertion
          matrix[i - 1][j] + 1      // deletion
        );
      }
    }
  }

  return matrix[len1][len2];
}

/**
 * Find closest matches using Levenshtein distance
 * @param value - The value to match
 * @param options - Candidate values
 * @param maxSuggestions - Maximum number of suggestions to return
 * @param maxDistance - Largest edit distance still worth suggesting
 * @returns Closest candidates, nearest first (ties keep candidate order)
 */
export function findClosestMatches(
  value: string,
  options: string[],
  maxSuggestions: number = 3,
  maxDistance: number = 3
): string[] {
  const valueLower = value.toLowerCase();

  const distances = options.map(option => ({
    option,
    distance: levenshteinDistance(valueLower, option.toLowerCase())
  }));

  distances.sort((a, b) => a.distance - b.distance);

  return distances
    .filter(d => d.distance <= maxDistance)
    .slice(0, maxSuggestions)
    .map(d => d.option);
}

/**
 * Report loader warnings to console in a formatted way
 * @param file - Workbook being loaded
 * @param warnings - Non-fatal warnings collected while consolidating
 */
export function reportLoadWarnings(file: string, warnings: string[]): void {
  if (warnings.length === 0) return;

  console.log(`⚠️  ${file} - loaded with ${warnings.length} warning(s)`);
  console.log('');
  warnings.forEach((warning, idx) => {
    const branch = idx === warnings.length - 1 ? '└─' : '├─';
    console.log(`  ${branch} ${warning}`);
  });
  console.log('');
}
