import type { ColorScheme } from "../types";

/**
 * Dark color scheme
 */
export const colors: ColorScheme = {
	bg: "#0d1117",
	bgSecondary: "#161b22",
	border: "#30363d",
	textPrimary: "#c9d1d9",
	textSecondary: "#8b949e",
	textDim: "#484f58",
	accent: "#21262d",
	highlight: "#30363d",
	success: "#3fb950",
	warning: "#d29922",
	error: "#f85149",
};

/**
 * Selectable color schemes, keyed by the `theme` config value
 */
export const colorSchemes = {
	zinc: colors,

	ocean: {
		bg: "#0f172a",
		bgSecondary: "#1e293b",
		border: "#334155",
		textPrimary: "#f8fafc",
		textSecondary: "#94a3b8",
		textDim: "#64748b",
		accent: "#3b82f6",
		highlight: "#60a5fa",
		success: "#22c55e",
		warning: "#f59e0b",
		error: "#ef4444",
	} satisfies ColorScheme,

	// Leaves the terminal's own colors untouched apart from emphasis
	mono: {
		bg: "",
		bgSecondary: "",
		border: "",
		textPrimary: "",
		textSecondary: "",
		textDim: "",
		accent: "",
		highlight: "",
		success: "",
		warning: "",
		error: "",
	} satisfies ColorScheme,
};
