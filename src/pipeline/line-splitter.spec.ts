import { LineSplitter } from './line-splitter';

describe('LineSplitter', () => {
  const collect = () => {
    const lines: string[] = [];
    return { lines, splitter: new LineSplitter((line) => lines.push(line)) };
  };

  it('emits complete lines across chunks and holds the tail until end', () => {
    const { lines, splitter } = collect();

    splitter.push(Buffer.from('Compiling cr'));
    splitter.push(Buffer.from('ate v0.1.0\r\nDocumenting crate\nFin'));
    expect(lines).toEqual(['Compiling crate v0.1.0', 'Documenting crate']);

    splitter.push(Buffer.from('ished'));
    splitter.end();
    expect(lines).toEqual(['Compiling crate v0.1.0', 'Documenting crate', 'Finished']);
  });

  it('keeps a multi-byte character split between chunks intact', () => {
    const { lines, splitter } = collect();
    const bytes = Buffer.from('Généré ✓\n', 'utf8');
    const cut = bytes.indexOf(0xa9);

    splitter.push(bytes.subarray(0, cut));
    splitter.push(bytes.subarray(cut));

    expect(lines).toEqual(['Généré ✓']);
  });

  it('emits nothing at end when the output ended with a newline', () => {
    const { lines, splitter } = collect();

    splitter.push(Buffer.from('one\n'));
    splitter.end();

    expect(lines).toEqual(['one']);
  });
});
