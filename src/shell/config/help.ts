// PURITY: CORE (constants)

export const VERSION = "1.1.0";

export const HELP_TEXT = `Usage: cpdump [OPTIONS] [FILENAME ...]
Output a representation of the contents of FILENAME as character
codepoints, like a hex dump but Unicode-aware. With multiple arguments,
the files' contents are concatenated together. With no arguments, or
when FILENAME is -, read from standard input.

  -c, --count=N         Display N characters per line [default=8]
  -i, --ignore          Treat invalid characters as individual bytes
  -s, --start=N         Start N characters after start of input
  -l, --limit=N         Stop after N characters of input
  -r, --reverse         Reverse operation: convert dump output to chars
  -e, --encoding=NAME   Character encoding [default: from the locale]
      --help            Display this help and exit
      --version         Display version information and exit

Encodings: utf-8, iso-8859-1, us-ascii, utf-7.
`;

export const VERSION_TEXT = `cpdump: v${VERSION}\n`;
