import { extractReading } from '@/services/extraction.service';
import { DeviceConfig } from '@/types/device.types';
import { FetchedDocument } from '@/types/fetch.types';

const fetchedAt = new Date('2024-06-01T02:00:00.000Z');

const htmlDocument = (body: string): FetchedDocument => ({
  endpoint: 'https://telemetry.example.com/gauge',
  kind: 'html',
  body,
  fetched_at: fetchedAt,
});

const jsonDocument = (body: string): FetchedDocument => ({ ...htmlDocument(body), kind: 'json' });

const device = (locators: DeviceConfig['locators'] = {}): DeviceConfig => ({
  device_id: 'G1',
  name: 'Test Gauge',
  endpoint: 'https://telemetry.example.com/gauge',
  fetch_mode: 'browser',
  locators,
});

describe('Extraction Service', () => {
  describe('structured lookup', () => {
    it('should read values from an assigned script payload', () => {
      const html = `<html><body>
        <script>window.__STATE__ = {"gauge":{"depth_mm":150.2,"velocity":{"value":"2.50"}}};</script>
        <div id="flow">Flow: 75.3 L/s</div>
      </body></html>`;

      const result = extractReading(device({ flow_lps: { selector: '#flow' } }), htmlDocument(html));

      expect(result.reading.fields).toEqual({ depth_mm: 150.2, velocity_mps: 2.5, flow_lps: 75.3 });
      expect(result.sources).toEqual({ depth_mm: 'structured', velocity_mps: 'structured', flow_lps: 'locator' });
      expect(result.missing).toEqual([]);
      expect(result.reading.fetch_success).toBe(true);
      expect(result.reading.observed_at).toBe(fetchedAt);
    });

    it('should read JSON script blocks using the locator key', () => {
      const html = '<script type="application/json">{"Readings":{"LEVEL_MM":88}}</script>';

      const result = extractReading(device({ depth_mm: { key: 'level_mm' } }), htmlDocument(html));

      expect(result.reading.fields.depth_mm).toBe(88);
      expect(result.sources.depth_mm).toBe('structured');
    });

    it('should prefer the structured payload over the DOM locator', () => {
      const html = `<script>var data = {"depth_mm": 100};</script><span id="depth">200 mm</span>`;

      const result = extractReading(device({ depth_mm: { selector: '#depth' } }), htmlDocument(html));

      expect(result.reading.fields.depth_mm).toBe(100);
    });
  });

  describe('locator lookup', () => {
    it('should parse the first number in the selected node', () => {
      const html = '<div id="div_varvalue_10">133mm</div><div id="div_varvalue_6">0.42 m/s</div>';

      const result = extractReading(
        device({ depth_mm: { selector: '#div_varvalue_10' }, velocity_mps: { selector: '#div_varvalue_6' } }),
        htmlDocument(html)
      );

      expect(result.reading.fields.depth_mm).toBe(133);
      expect(result.reading.fields.velocity_mps).toBe(0.42);
      expect(result.sources.depth_mm).toBe('locator');
    });

    it('should follow a dotted json_path into a JSON body', () => {
      const body = '{"data":{"points":[{"value":12.5}]},"velocity_mps":"0.8"}';

      const result = extractReading(device({ depth_mm: { json_path: 'data.points.0.value' } }), jsonDocument(body));

      expect(result.reading.fields).toEqual({ depth_mm: 12.5, velocity_mps: 0.8, flow_lps: null });
      expect(result.sources).toEqual({ depth_mm: 'locator', velocity_mps: 'structured' });
      expect(result.missing).toEqual(['flow_lps']);
    });
  });

  describe('pattern scan', () => {
    it('should fall back to labelled values in the page text', () => {
      const html = '<p>Depth: <strong>133mm</strong></p><p>Velocity 0.42 m/s</p><p>Discharge: -1.5 L/s</p>';

      const result = extractReading(device(), htmlDocument(html));

      expect(result.reading.fields).toEqual({ depth_mm: 133, velocity_mps: 0.42, flow_lps: -1.5 });
      expect(result.sources).toEqual({ depth_mm: 'pattern', velocity_mps: 'pattern', flow_lps: 'pattern' });
    });

    it('should match labels case-insensitively', () => {
      const result = extractReading(device(), htmlDocument('<div>WATER LEVEL: 42.0 MM</div>'));
      expect(result.reading.fields.depth_mm).toBe(42);
    });

    it('should ignore text inside scripts and styles', () => {
      const html = '<style>.depth: 99 {}</style><script>// depth: 77</script><p>nothing here</p>';

      const result = extractReading(device(), htmlDocument(html));

      expect(result.reading.fields.depth_mm).toBeNull();
    });

    it('should not take a labelled number without a known unit', () => {
      const html = '<p>Battery level: 85 %</p><p>Flow 1 of 3 pumps online</p><p>Speed 4G</p>';

      const result = extractReading(device(), htmlDocument(html));

      expect(result.reading.fields).toEqual({ depth_mm: null, velocity_mps: null, flow_lps: null });
      expect(result.sources).toEqual({});
      expect(result.missing).toEqual(['depth_mm', 'velocity_mps', 'flow_lps']);
    });

    it('should skip a unitless match and use a later one with a unit', () => {
      const html = '<p>Battery level: 85 %</p><p>Water level 212 mm</p>';

      const result = extractReading(device(), htmlDocument(html));

      expect(result.reading.fields.depth_mm).toBe(212);
    });

    it('should fall through when a selector cannot be evaluated', () => {
      const result = extractReading(device({ depth_mm: { selector: '###' } }), htmlDocument('<p>Level 5.5 mm</p>'));

      expect(result.reading.fields.depth_mm).toBe(5.5);
      expect(result.sources.depth_mm).toBe('pattern');
    });
  });

  describe('partial and failed documents', () => {
    it('should leave a missing field absent without dropping the others', () => {
      const html = '<div id="d">150.2</div><div id="f">75.3</div>';

      const result = extractReading(
        device({ depth_mm: { selector: '#d' }, velocity_mps: { selector: '#v' }, flow_lps: { selector: '#f' } }),
        htmlDocument(html)
      );

      expect(result.reading.fields).toEqual({ depth_mm: 150.2, velocity_mps: null, flow_lps: 75.3 });
      expect(result.reading.fetch_success).toBe(true);
      expect(result.missing).toEqual(['velocity_mps']);
    });

    it('should keep a zero value distinct from absent', () => {
      const result = extractReading(device({ flow_lps: { selector: '#f' } }), htmlDocument('<div id="f">0.0</div>'));
      expect(result.reading.fields.flow_lps).toBe(0);
    });

    it('should mark an unparseable JSON body as a failed fetch', () => {
      const result = extractReading(device(), jsonDocument('{"depth": '));

      expect(result.reading.fetch_success).toBe(false);
      expect(result.reading.fields).toEqual({ depth_mm: null, velocity_mps: null, flow_lps: null });
      expect(result.missing).toEqual(['depth_mm', 'velocity_mps', 'flow_lps']);
    });

    it('should mark an empty body as a failed fetch', () => {
      expect(extractReading(device(), htmlDocument('   ')).reading.fetch_success).toBe(false);
    });

    it('should return an all-absent failed reading without a document', () => {
      const observedAt = new Date('2024-06-01T03:00:00.000Z');
      const result = extractReading(device(), null, observedAt);

      expect(result.reading).toEqual({
        device_id: 'G1',
        observed_at: observedAt,
        fields: { depth_mm: null, velocity_mps: null, flow_lps: null },
        fetch_success: false,
      });
    });
  });
});
