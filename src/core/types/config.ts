// CHANGE: Configuration and CLI option types for the snapshot pipeline
// WHY: Separate "what the user typed" from "what the pipeline runs with"
// PURITY: CORE
// INVARIANT: All fields readonly; optional CLI fields mean "not given"

/**
 * Clipboard backend selection. `auto` picks by platform and session type.
 */
export type ClipboardBackend = "auto" | "xclip" | "wl-copy" | "osascript";

/**
 * Executable names (or absolute paths) of the external programs.
 */
export interface ToolCommands {
	readonly pangoView: string;
	readonly ansifilter: string;
	readonly xclip: string;
	readonly wlCopy: string;
	readonly osascript: string;
}

/**
 * Настройки из codesnap.config.json, дополненные значениями по умолчанию.
 *
 * @property renderLineLimit Максимум строк в одном фрагменте для рендера
 * @property shotsDir Каталог для режима --sshoot
 */
export interface SnapshotConfig {
	readonly style: string;
	readonly dpi: number;
	readonly width: number;
	readonly font: string;
	readonly maxLines: number;
	readonly splitAt: string;
	readonly renderLineLimit: number;
	readonly clipboard: ClipboardBackend;
	readonly shotsDir: string;
	readonly tools: ToolCommands;
}

/**
 * Опции командной строки.
 *
 * @property inputFile Путь к исходному файлу (отсутствует → stdin)
 * @property outputFile Сохранить в файл вместо буфера обмена
 * @property configPath Явный путь к файлу конфигурации
 */
export interface CLIOptions {
	readonly inputFile?: string;
	readonly outputFile?: string;
	readonly configPath?: string;
	readonly dpi?: number;
	readonly style?: string;
	readonly font?: string;
	readonly lang?: string;
	readonly title?: string;
	readonly width?: number;
	readonly maxLines?: number;
	readonly splitAt?: string;
	readonly startLine: number;
	readonly lineNumbers: boolean;
	readonly fixWidth: boolean;
	readonly ansi: boolean;
	readonly shots: boolean;
	readonly help: boolean;
}

/**
 * Effective settings for one pipeline run (CLI > config > defaults).
 */
export interface SnapshotOptions {
	readonly inputFile: string | null;
	readonly outputFile: string | null;
	readonly shots: boolean;
	readonly style: string;
	readonly dpi: number;
	readonly width: number;
	readonly fixWidth: boolean;
	readonly font: string;
	readonly lang: string | null;
	readonly title: string | null;
	readonly lineNumbers: boolean;
	readonly startLine: number;
	readonly ansi: boolean;
	readonly maxLines: number;
	/** True when maxLines came from the command line. */
	readonly maxLinesExplicit: boolean;
	readonly splitAt: string;
	readonly renderLineLimit: number;
	readonly clipboard: ClipboardBackend;
	readonly shotsDir: string;
	readonly tools: ToolCommands;
}
