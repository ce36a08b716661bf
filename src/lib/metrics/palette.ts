// Plotly 기본 qualitative 팔레트
export const ASSET_PALETTE = [
  "#636efa",
  "#ef553b",
  "#00cc96",
  "#ab63fa",
  "#ffa15a",
  "#19d3f3",
  "#ff6692",
  "#b6e880",
  "#ff97ff",
  "#fecb52",
] as const;

/** 처음 등장한 순서대로 색을 배정, 10개 이후는 순환 */
export function assetColorMap(assets: string[]): Record<string, string> {
  const colors: Record<string, string> = {};
  let index = 0;
  for (const asset of assets) {
    if (asset in colors) continue;
    colors[asset] = ASSET_PALETTE[index % ASSET_PALETTE.length];
    index++;
  }
  return colors;
}
