/**
 * Style references dxf-parser leaves undecoded: group 7 on TEXT and MTEXT,
 * group 3 on DIMENSION. Only the ENTITIES section is read, in file order, so
 * the n-th value of a kind belongs to the n-th decoded entity of that kind.
 */
const STYLE_CODES = new Map<string, number>([
  ['TEXT', 7],
  ['MTEXT', 7],
  ['DIMENSION', 3]
]);

interface OpenEntity {
  styles: Array<string | undefined>;
  slot: number;
  code: number;
}

export class EntityStyleIndex {
  private readonly cursors = new Map<string, number>();

  constructor(private readonly styles: ReadonlyMap<string, ReadonlyArray<string | undefined>>) {}

  /**
   * Style of the next entity of this kind, undefined when it names none
   */
  take(type: string): string | undefined {
    const queue = this.styles.get(type);
    if (!queue) return undefined;
    const cursor = this.cursors.get(type) ?? 0;
    this.cursors.set(type, cursor + 1);
    return queue[cursor];
  }
}

export function scanEntityStyles(content: string): EntityStyleIndex {
  const lines = content.split(/\r\n|\r|\n/);
  const styles = new Map<string, Array<string | undefined>>();
  let section = '';
  let awaitingSectionName = false;
  let open: OpenEntity | undefined;

  for (let i = 0; i + 1 < lines.length; i += 2) {
    const code = Number.parseInt(lines[i].trim(), 10);
    const value = lines[i + 1].trim();

    if (code === 0) {
      open = undefined;
      if (value === 'SECTION') {
        awaitingSectionName = true;
      } else if (value === 'ENDSEC') {
        section = '';
      } else if (section === 'ENTITIES') {
        const styleCode = STYLE_CODES.get(value);
        if (styleCode !== undefined) {
          const queue = styles.get(value) ?? [];
          styles.set(value, queue);
          queue.push(undefined);
          open = { styles: queue, slot: queue.length - 1, code: styleCode };
        }
      }
      continue;
    }

    if (awaitingSectionName) {
      if (code === 2) section = value;
      awaitingSectionName = false;
      continue;
    }

    if (open && code === open.code && open.styles[open.slot] === undefined) {
      open.styles[open.slot] = value;
    }
  }

  return new EntityStyleIndex(styles);
}
