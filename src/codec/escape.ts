/**
 * Cell-level escaping shared by the decoder and the encoder.
 */

export const BACKSLASH = 92;
export const CHAR_n = 110;

/** The single-character line that encodes an empty cell. */
export const EMPTY_CELL_MARKER = "\\";

enum ScanState {
	Normal,
	SawBackslash,
}

/**
 * Decode one non-empty cell line.
 *
 * `\\` yields a backslash and `\n` a newline. A backslash before any other
 * character, or at the end of the line, is kept as literal text.
 */
export function unescapeCell(segment: string): string {
	if (segment === EMPTY_CELL_MARKER) return "";
	if (!segment.includes("\\")) return segment;

	let out = "";
	let state = ScanState.Normal;

	for (let i = 0; i < segment.length; i++) {
		const code = segment.charCodeAt(i);

		if (state === ScanState.SawBackslash) {
			if (code === BACKSLASH) {
				out += "\\";
			} else if (code === CHAR_n) {
				out += "\n";
			} else {
				out += `\\${segment.charAt(i)}`;
			}
			state = ScanState.Normal;
		} else if (code === BACKSLASH) {
			state = ScanState.SawBackslash;
		} else {
			out += segment.charAt(i);
		}
	}

	if (state === ScanState.SawBackslash) out += "\\";
	return out;
}

/**
 * Encode one cell as a single line (without its line ending).
 * Backslashes are doubled before newlines are replaced.
 */
export function escapeCell(cell: string): string {
	if (cell === "") return EMPTY_CELL_MARKER;
	if (!cell.includes("\\") && !cell.includes("\n")) return cell;
	return cell.replaceAll("\\", "\\\\").replaceAll("\n", "\\n");
}
