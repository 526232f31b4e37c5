/**
 * Shared types for the theme module.
 */

/** Logical widget roles a theme can style */
export type WidgetRole =
  | 'title'
  | 'body'
  | 'citation'
  | 'code_block'
  | 'status_table'
  | 'status_ok'
  | 'status_fail'
  | 'status_warn'

export type WidgetClasses = Record<WidgetRole, string>

/**
 * Input to defineTheme().
 */
export interface ThemeDefinition {
  /** Unique, non-empty name */
  name: string
  /** Context tags the theme requires; empty for the default theme */
  tags?: readonly string[]
  /** Stylesheet address; may be shared between themes */
  stylesheet?: string
  /** Overrides for roles; unlisted roles keep DEFAULT_WIDGET_CLASSES */
  widgetClasses?: Partial<WidgetClasses>
}

/**
 * A registered presentation theme (skin).
 */
export interface Theme {
  readonly name: string
  readonly tags: ReadonlySet<string>
  readonly stylesheet: string
  /** Only the roles this theme overrides */
  readonly widgetClasses: Readonly<Partial<WidgetClasses>>
  /** Full role → class mapping with defaults filled in */
  getClasses(): WidgetClasses
}

/**
 * A tagger derives context tags from the current instant.
 * Taggers are pure: same instant, same tags.
 */
export type Tagger = (now: Date) => string[]
