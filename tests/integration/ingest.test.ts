import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { encodeEvent } from '../../src/codec/event-codec.js';
import type { IngestedScore } from '../../src/core/score.js';
import { parseScore, parseScoreAsync, parseScoreFile } from '../../src/public/api.js';
import { createZip } from '../helpers/zip.js';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
const TREBLE_ATTRIBUTES = '<attributes><divisions>2</divisions><clef><sign>G</sign><line>2</line></clef></attributes>';

function singlePart(body: string, attributes = TREBLE_ATTRIBUTES): string {
  return `${XML_DECLARATION}
<score-partwise version="4.0">
  <part-list><score-part id="P1"><part-name>Lead</part-name></score-part></part-list>
  <part id="P1">
    <measure number="1">${attributes}${body}</measure>
  </part>
</score-partwise>`;
}

function pitched(step: string, octave: number, extra = ''): string {
  return `<note><pitch><step>${step}</step><octave>${octave}</octave></pitch><duration>2</duration><type>quarter</type>${extra}</note>`;
}

function encoded(score: IngestedScore | undefined, voice = '1', part = 0): string[] | undefined {
  return score?.instruments[part]?.voices.get(voice)?.map(encodeEvent);
}

const PIANO = `${XML_DECLARATION}
<score-partwise version="4.0">
  <part-list>
    <score-part id="P1"><part-name>Piano</part-name></score-part>
  </part-list>
  <part id="P1">
    <measure number="1">
      <attributes>
        <divisions>2</divisions>
        <staves>2</staves>
        <clef number="1"><sign>G</sign><line>2</line></clef>
        <clef number="2"><sign>F</sign><line>4</line></clef>
      </attributes>
      <direction><sound tempo="84"/></direction>
      <note>
        <pitch><step>E</step><alter>-1</alter><octave>5</octave></pitch>
        <duration>2</duration><voice>1</voice><type>quarter</type><staff>1</staff>
        <notations><articulations><staccato/><accent/></articulations></notations>
      </note>
      <note>
        <pitch><step>G</step><octave>4</octave></pitch>
        <duration>2</duration><voice>1</voice><type>quarter</type><staff>1</staff>
      </note>
      <note>
        <chord/>
        <pitch><step>B</step><octave>4</octave></pitch>
        <duration>2</duration><voice>1</voice><type>quarter</type><staff>1</staff>
      </note>
      <note><rest/><duration>4</duration><voice>1</voice><type>half</type><staff>1</staff></note>
      <backup><duration>8</duration></backup>
      <note>
        <pitch><step>C</step><octave>3</octave></pitch>
        <duration>8</duration><voice>5</voice><type>whole</type><staff>2</staff>
      </note>
    </measure>
  </part>
</score-partwise>`;

const TIMEWISE = `${XML_DECLARATION}
<score-timewise version="4.0">
  <part-list>
    <score-part id="P1"><part-name>Upper</part-name></score-part>
    <score-part id="P2"><part-name>Lower</part-name></score-part>
  </part-list>
  <measure number="1">
    <part id="P1">
      <attributes><divisions>1</divisions><clef><sign>G</sign><line>2</line></clef></attributes>
      <note><pitch><step>C</step><octave>5</octave></pitch><duration>4</duration></note>
    </part>
    <part id="P2">
      <attributes><divisions>1</divisions><clef><sign>F</sign></clef></attributes>
      <note><pitch><step>C</step><octave>3</octave></pitch><duration>4</duration><type>whole</type></note>
    </part>
  </measure>
  <measure number="2">
    <part id="P1">
      <note><pitch><step>D</step><octave>5</octave></pitch><duration>2</duration><type>half</type></note>
    </part>
  </measure>
</score-timewise>`;

const CONTAINER = `${XML_DECLARATION}
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="score.xml" media-type="application/vnd.recordare.musicxml+xml" />
  </rootfiles>
</container>`;

describe('score ingestion', () => {
  it('reads a two-staff part into one stream per staff', () => {
    const result = parseScore(PIANO, { sourceName: 'piano.musicxml' });

    expect(result.diagnostics).toEqual([]);
    expect(result.score?.sourceName).toBe('piano.musicxml');
    expect(result.score?.resolution).toBe(2);
    expect(result.score?.tempo).toBe(84);
    expect(result.score?.instruments.map((instrument) => [instrument.id, instrument.name])).toEqual([['P1', 'Piano']]);
    expect([...(result.score?.instruments[0]?.voices.keys() ?? [])]).toEqual(['1', '2']);
    expect(encoded(result.score, '1')).toEqual([
      '(G,2)Eb5|staccato,accent>>1/4|2',
      '(G,2)G4|>(G,2)B4|>>1/4|2',
      '(G,2)R|>>1/2|4'
    ]);
    expect(encoded(result.score, '2')).toEqual(['(F,4)C3|>>1/1|8']);
  });

  it('groups by <voice> when asked to', () => {
    const result = parseScore(PIANO, { voiceKey: 'voice' });

    expect([...(result.score?.instruments[0]?.voices.keys() ?? [])]).toEqual(['1', '5']);
    expect(encoded(result.score, '5')).toEqual(['(F,4)C3|>>1/1|8']);
  });

  it('normalizes score-timewise documents and derives missing types', () => {
    const result = parseScore(TIMEWISE);

    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual([
      'SCORE_TIMEWISE_NORMALIZED',
      'NOTE_TYPE_DERIVED'
    ]);
    expect(result.diagnostics[1]?.message).toBe('Derived type 1/1 from duration 4 at 1 division(s).');
    expect(result.score?.instruments.map((instrument) => instrument.name)).toEqual(['Upper', 'Lower']);
    expect(encoded(result.score, '1', 0)).toEqual(['(G,2)C5|>>1/1|4', '(G,2)D5|>>1/2|2']);
    expect(encoded(result.score, '1', 1)).toEqual(['(F,4)C3|>>1/1|4']);
  });

  it('rounds dotted durations down when deriving a type', () => {
    const result = parseScore(
      singlePart('<note><pitch><step>A</step><octave>4</octave></pitch><duration>3</duration></note>')
    );

    expect(encoded(result.score)).toEqual(['(G,2)A4|>>1/4|3']);
  });

  it('keeps grace notes without a duration', () => {
    const result = parseScore(
      singlePart(
        `<note><grace/><pitch><step>D</step><octave>5</octave></pitch><type>eighth</type></note>${pitched('C', 5)}`
      )
    );

    expect(result.diagnostics).toEqual([]);
    expect(encoded(result.score)).toEqual(['(G,2)D5|>>1/8|None', '(G,2)C5|>>1/4|2']);
  });

  it('assumes a treble clef once per staff when none is given', () => {
    const result = parseScore(
      singlePart(`${pitched('C', 4)}${pitched('D', 4)}`, '<attributes><divisions>2</divisions></attributes>')
    );

    expect(result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity, diagnostic.message])).toEqual([
      ['CLEF_DEFAULTED', 'info', 'Staff 1 has no clef before its first note; assuming G2.']
    ]);
    expect(encoded(result.score)).toEqual(['(G,2)C4|>>1/4|2', '(G,2)D4|>>1/4|2']);
  });

  it('follows clef changes between notes', () => {
    const result = parseScore(
      singlePart(`${pitched('C', 4)}<attributes><clef><sign>C</sign><line>4</line></clef></attributes>${pitched('D', 3)}`)
    );

    expect(encoded(result.score)).toEqual(['(G,2)C4|>>1/4|2', '(C,4)D3|>>1/4|2']);
  });

  it('skips unusable notes with a warning in lenient mode', () => {
    const result = parseScore(
      singlePart(
        `<note><duration>2</duration><type>quarter</type></note>` +
          `<note><pitch><step>F</step><alter>0.5</alter><octave>4</octave></pitch><duration>2</duration><type>quarter</type></note>` +
          pitched('G', 4)
      ),
      { sourceName: 'broken.musicxml' }
    );

    expect(result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity])).toEqual([
      ['NOTE_WITHOUT_PITCH', 'warning'],
      ['UNSUPPORTED_ALTER', 'warning']
    ]);
    expect(result.diagnostics[0]?.xmlPath).toBe('/score-partwise[1]/part[1]/measure[1]/note[1]');
    expect(result.diagnostics[0]?.source?.name).toBe('broken.musicxml');
    expect(encoded(result.score)).toEqual(['(G,2)G4|>>1/4|2']);
  });

  it('turns warnings into errors and withholds the score in strict mode', () => {
    const result = parseScore(singlePart('<note><duration>2</duration><type>quarter</type></note>'), { mode: 'strict' });

    expect(result.score).toBeUndefined();
    expect(result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity])).toEqual([
      ['NOTE_WITHOUT_PITCH', 'error']
    ]);
  });

  it('warns about a chord note with nothing to attach to', () => {
    const result = parseScore(singlePart(`${pitched('C', 4, '<chord/>')}${pitched('E', 4)}`));

    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['CHORD_WITHOUT_BASE_NOTE']);
    expect(encoded(result.score)).toEqual(['(G,2)E4|>>1/4|2']);
  });

  it('drops chord members of a skipped base note instead of joining the previous event', () => {
    const result = parseScore(
      singlePart(
        pitched('C', 4) +
          '<note><pitch><step>E</step><octave>4</octave></pitch></note>' +
          pitched('G', 4, '<chord/>') +
          pitched('A', 4)
      )
    );

    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual([
      'MISSING_DURATION',
      'MISSING_NOTE_TYPE',
      'CHORD_BASE_SKIPPED'
    ]);
    expect(encoded(result.score)).toEqual(['(G,2)C4|>>1/4|2', '(G,2)A4|>>1/4|2']);
  });

  it('falls back to 120 BPM for an unusable tempo', () => {
    const result = parseScore(singlePart(`<direction><sound tempo="0"/></direction>${pitched('C', 4)}`));

    expect(result.score?.tempo).toBe(120);
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['INVALID_TEMPO']);
  });

  it('assumes one division per quarter when none is declared', () => {
    const result = parseScore(
      singlePart(pitched('C', 4), '<attributes><clef><sign>G</sign><line>2</line></clef></attributes>')
    );

    expect(result.score?.resolution).toBe(1);
    expect(result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity])).toEqual([
      ['MISSING_DIVISIONS', 'info']
    ]);
  });

  it('reports parts whose divisions differ from the score resolution', () => {
    const xml = `${XML_DECLARATION}
<score-partwise version="4.0">
  <part-list>
    <score-part id="P1"><part-name>One</part-name></score-part>
    <score-part id="P2"><part-name>Two</part-name></score-part>
  </part-list>
  <part id="P1"><measure number="1">${TREBLE_ATTRIBUTES}${pitched('C', 4)}</measure></part>
  <part id="P2"><measure number="1"><attributes><divisions>4</divisions><clef><sign>G</sign><line>2</line></clef></attributes>${pitched('C', 4)}</measure></part>
</score-partwise>`;
    const result = parseScore(xml);

    expect(result.score?.resolution).toBe(2);
    expect(result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.message])).toEqual([
      [
        'DIVISIONS_MISMATCH',
        "Part 'P2' uses 4 division(s) but the score resolution is 2; durations are kept as written."
      ]
    ]);
  });

  it.each([
    ['<score-partwise><part-list></score-partwise>', 'XML_NOT_WELL_FORMED'],
    ['<opus><title>Set</title></opus>', 'UNSUPPORTED_ROOT'],
    ['<score-partwise><part-list/></score-partwise>', 'MISSING_PARTS']
  ])('fails on %j with %s', (xml, code) => {
    const result = parseScore(xml);

    expect(result.score).toBeUndefined();
    expect(result.diagnostics.at(-1)?.code).toBe(code);
    expect(result.diagnostics.at(-1)?.severity).toBe('error');
  });
});

describe('compressed MusicXML', () => {
  const score = singlePart(pitched('C', 4));

  it('reads the rootfile named by the container', async () => {
    const archive = createZip([
      { name: 'META-INF/container.xml', data: CONTAINER },
      { name: 'other.musicxml', data: singlePart(pitched('B', 2)) },
      { name: 'score.xml', data: score, deflate: true }
    ]);
    const result = await parseScoreAsync({ data: archive });

    expect(result.diagnostics).toEqual([]);
    expect(encoded(result.score)).toEqual(['(G,2)C4|>>1/4|2']);
  });

  it('prefers a .musicxml entry when the container is missing', async () => {
    const archive = createZip([
      { name: 'notes.xml', data: singlePart(pitched('B', 2)), deflate: true },
      { name: 'music/piece.musicxml', data: score, deflate: true }
    ]);
    const result = await parseScoreAsync({ data: archive, format: 'mxl' });

    expect(result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity])).toEqual([
      ['MXL_CONTAINER_MISSING', 'warning']
    ]);
    expect(encoded(result.score)).toEqual(['(G,2)C4|>>1/4|2']);
  });

  it('falls back to the first entry when the container names no rootfile', async () => {
    const archive = createZip([
      { name: 'META-INF/container.xml', data: '<container><rootfiles/></container>' },
      { name: 'piece.xml', data: score }
    ]);
    const result = await parseScoreAsync({ data: archive });

    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['MXL_CONTAINER_INVALID']);
    expect(result.score).toBeDefined();
  });

  it('fails when the named rootfile is absent', async () => {
    const archive = createZip([{ name: 'META-INF/container.xml', data: CONTAINER }]);
    const result = await parseScoreAsync({ data: archive });

    expect(result.score).toBeUndefined();
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['MXL_SCORE_FILE_NOT_FOUND']);
  });

  it('rejects bytes that are not a ZIP archive', async () => {
    const result = await parseScoreAsync({ data: new TextEncoder().encode('PK-not-really-an-archive') });

    expect(result.score).toBeUndefined();
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['MXL_INVALID_ARCHIVE']);
  });

  it('rejects text passed as an archive', async () => {
    const result = await parseScoreAsync({ data: score, format: 'mxl' });

    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['MXL_INVALID_ARCHIVE']);
  });

  it('escalates archive warnings in strict mode', async () => {
    const archive = createZip([{ name: 'piece.musicxml', data: score }]);
    const result = await parseScoreAsync({ data: archive }, { mode: 'strict' });

    expect(result.score).toBeUndefined();
    expect(result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity])).toEqual([
      ['MXL_CONTAINER_MISSING', 'error']
    ]);
  });

  it('decodes plain XML bytes', async () => {
    const result = await parseScoreAsync({ data: new TextEncoder().encode(score) });

    expect(encoded(result.score)).toEqual(['(G,2)C4|>>1/4|2']);
  });
});

describe('parseScoreFile', () => {
  it('names the score after its file and detects archives by extension', async () => {
    const workDir = await mkdtemp(path.join(os.tmpdir(), 'score-markov-ingest-'));
    try {
      const xmlPath = path.join(workDir, 'lead.musicxml');
      const mxlPath = path.join(workDir, 'lead.mxl');
      await writeFile(xmlPath, singlePart(pitched('C', 4)), 'utf8');
      await writeFile(
        mxlPath,
        createZip([
          { name: 'META-INF/container.xml', data: CONTAINER },
          { name: 'score.xml', data: singlePart(pitched('D', 4)), deflate: true }
        ])
      );

      const xml = await parseScoreFile(xmlPath);
      const mxl = await parseScoreFile(mxlPath);

      expect(xml.score?.sourceName).toBe('lead.musicxml');
      expect(mxl.score?.sourceName).toBe('lead.mxl');
      expect(encoded(mxl.score)).toEqual(['(G,2)D4|>>1/4|2']);
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  });
});
