export interface ProgressBarGeometry {
  readonly x: number;
  readonly y: number;
  readonly trackWidth: number;
  readonly filledWidth: number;
  readonly height: number;
}

export interface LabelPlacement {
  readonly x: number;
  readonly y: number;
  readonly fontSize: number;
}

function horizontalMargin(width: number): number {
  return Math.min(Math.max(1, Math.round(width * 0.03)), Math.floor((width - 1) / 2));
}

/**
 * Bar along the bottom edge whose filled part grows with `(index + 1) / total`.
 * Always fits inside a `width x height` frame, down to 1x1.
 */
export function computeProgressBar(
  width: number,
  height: number,
  index: number,
  total: number,
): ProgressBarGeometry {
  if (total <= 0 || index < 0 || index >= total) {
    throw new RangeError(`Frame index ${index} is outside a sequence of ${total} frames`);
  }

  const marginX = horizontalMargin(width);
  const trackWidth = width - marginX * 2;
  const barHeight = Math.max(1, Math.round(height * 0.04));
  const marginY = Math.min(Math.max(1, Math.round(height * 0.03)), height - barHeight);
  const filledWidth = Math.max(1, Math.round((trackWidth * (index + 1)) / total));

  return {
    x: marginX,
    y: height - marginY - barHeight,
    trackWidth,
    filledWidth: Math.min(filledWidth, trackWidth),
    height: barHeight,
  };
}

export function computeLabelPlacement(width: number, height: number): LabelPlacement {
  return {
    x: horizontalMargin(width),
    y: Math.max(1, Math.round(height * 0.03)),
    fontSize: Math.max(8, Math.round(height * 0.06)),
  };
}

export function formatProgressLabel(label: string, index: number, total: number): string {
  const counter = `${index + 1}/${total}`;
  return label ? `${label} ${counter}` : counter;
}
