export interface WavetableMeta {
  name: string;
  /** sample count */
  width: number;
  /** value ceiling; stored on disk minus one */
  height: number;
}

export interface Wavetable {
  meta: WavetableMeta;
  data: number[];
}

export function createWavetable(width = 32, height = 32, name = ''): Wavetable {
  return { meta: { name, width, height }, data: new Array<number>(width).fill(0) };
}
