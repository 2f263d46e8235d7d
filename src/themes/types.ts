export interface ThemeConfig {
  /** Plot background fill. */
  readonly backgroundColor: string;
  /** 1px frame around the plot rectangle. */
  readonly frameColor: string;
  readonly crosshairColor: string;
  /** Marker drawn on the hovered value. */
  readonly highlightColor: string;
  readonly textColor: string;
  readonly fontFamily: string;
  readonly fontSize: number;
}
