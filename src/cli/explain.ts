export const explanation = `
How tidyname works:

1. Collect the files under the given path (recursively with -r), filtered by --ext
   and --exclude. Names starting with a dot, and everything inside a dot-directory
   such as .git, are skipped unless --hidden is given. Directories that cannot be
   read are reported and skipped.
2. Look for a date already in each name: YYYY-MM-DD, YYYY_MM_DD, YYYYMMDD,
   MM-DD-YYYY or MM_DD_YYYY, in that order. Impossible dates are ignored.
3. Cut that date out of the name, or drop a leading date-shaped prefix when none was found.
4. Lowercase the rest, turn spaces and underscores into hyphens, collapse and trim hyphens.
5. Put the found date back in front (as YYYY-MM-DD, YYYY-MM or YYYY), or, with -d,
   the file's creation date. Lowercase the extension.
6. If the name is taken, add -1, -2, ... before the extension.
7. Rename the file (or just print it with -n). With --dirs, directories follow,
   deepest first, sanitized by name only.
`;
