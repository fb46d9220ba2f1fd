/**
 * How the delete column of a row behaves
 */
export const DELETE_LINK = {
  NO_DELETE: 0,
  DELETE_ROW: 1,
  KILL_PROCESS: 2,
} as const;

export type DeleteLinkMode = (typeof DELETE_LINK)[keyof typeof DELETE_LINK];

export interface DisplayPartsInput {
  hasEditLink?: boolean;
  deleteLink?: DeleteLinkMode;
  hasSortLink?: boolean;
  hasNavigationBar?: boolean;
  hasBookmarkForm?: boolean;
  hasTextButton?: boolean;
  hasPrintLink?: boolean;
}

/**
 * Which affordances of the grid are shown for a result.
 */
export class DisplayParts {
  private constructor(
    readonly hasEditLink: boolean,
    readonly deleteLink: DeleteLinkMode,
    readonly hasSortLink: boolean,
    readonly hasNavigationBar: boolean,
    readonly hasBookmarkForm: boolean,
    readonly hasTextButton: boolean,
    readonly hasPrintLink: boolean
  ) {}

  /** Missing parts are off */
  static fromArray(parts: DisplayPartsInput): DisplayParts {
    return new DisplayParts(
      parts.hasEditLink ?? false,
      parts.deleteLink ?? DELETE_LINK.NO_DELETE,
      parts.hasSortLink ?? false,
      parts.hasNavigationBar ?? false,
      parts.hasBookmarkForm ?? false,
      parts.hasTextButton ?? false,
      parts.hasPrintLink ?? false
    );
  }

  /** Copy with some parts changed */
  with(parts: DisplayPartsInput): DisplayParts {
    return new DisplayParts(
      parts.hasEditLink ?? this.hasEditLink,
      parts.deleteLink ?? this.deleteLink,
      parts.hasSortLink ?? this.hasSortLink,
      parts.hasNavigationBar ?? this.hasNavigationBar,
      parts.hasBookmarkForm ?? this.hasBookmarkForm,
      parts.hasTextButton ?? this.hasTextButton,
      parts.hasPrintLink ?? this.hasPrintLink
    );
  }
}
