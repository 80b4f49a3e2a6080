/*
 SVG renderer for "1"/"0" bar patterns

 - One module per bit; neighbouring bar modules become one rect
 - Quiet zone of spaces on each side
 - Optional caption under the bars
*/

import { describeBarcode, type Barcode } from "./barcode";
import { patternToModules } from "./digits";

export type BarRenderOptions = {
  moduleWidth?: number; // width of one module in px
  height?: number; // total height in px
  quietZone?: number; // quiet zone width in modules on each side
  background?: string; // SVG background fill
  barColor?: string; // bar color
  displayValue?: boolean; // render the caption
  text?: string; // caption, required for displayValue to show anything
  fontFamily?: string;
  fontSize?: number; // in px
  textMargin?: number; // space between bars and text in px
};

export function renderBarsToSvg(barPattern: string, options: BarRenderOptions = {}): string {
  const {
    moduleWidth = 2,
    height = 60,
    quietZone = 10,
    background = "#ffffff",
    barColor = "#000000",
    displayValue = false,
    text = "",
    fontFamily = "monospace",
    fontSize = 14,
    textMargin = 4,
  } = options;

  const modules = patternToModules(barPattern);
  const showText = displayValue && text.length > 0;

  const totalModules = barPattern.length + quietZone * 2;
  const barsHeight = showText ? Math.max(0, height - fontSize - textMargin) : height;
  const widthPx = totalModules * moduleWidth;
  const heightPx = height;

  let x = quietZone * moduleWidth;
  let isBar = true;

  let svgBars = "";
  for (const w of modules) {
    const wPx = w * moduleWidth;
    if (isBar && wPx > 0) {
      svgBars += `<rect x="${x}" y="0" width="${wPx}" height="${barsHeight}" fill="${barColor}"/>`;
    }
    x += wPx;
    isBar = !isBar;
  }

  let svgText = "";
  if (showText) {
    const textY = barsHeight + textMargin + fontSize * 0.8;
    const textX = widthPx / 2;
    svgText = `<text x="${textX}" y="${textY}" text-anchor="middle" font-family="${escapeXml(fontFamily)}" font-size="${fontSize}">${escapeXml(text)}</text>`;
  }

  return `<?xml version="1.0" encoding="UTF-8"?>\n` +
    `<svg xmlns="http://www.w3.org/2000/svg" width="${widthPx}" height="${heightPx}" viewBox="0 0 ${widthPx} ${heightPx}" shape-rendering="crispEdges">` +
    `<rect x="0" y="0" width="100%" height="100%" fill="${background}"/>` +
    `${svgBars}${svgText}</svg>`;
}

/** Renders a barcode with its display text as the caption. */
export function renderBarcodeToSvg(barcode: Barcode, options: Omit<BarRenderOptions, "text"> = {}): string {
  const { barPattern, displayText } = describeBarcode(barcode);
  return renderBarsToSvg(barPattern, { displayValue: true, ...options, text: displayText });
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}
