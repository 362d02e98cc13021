// ── Tool Definitions ──────────────────────────────────────────────

export interface ToolDef {
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export type ApiMethod = 'get' | 'post';
export type ApiCall = (method: ApiMethod, path: string, data?: unknown) => Promise<unknown>;

const MODES = ['average', 'waterfall', 'peak', 'envelope'];

export const TOOLS: Record<string, ToolDef> = {
  spectrum_files: {
    description: 'List rtl_power CSV files available in the server data directory',
    inputSchema: { type: 'object', properties: {} },
  },
  spectrum_view: {
    description: 'Load one or more rtl_power CSV files and return chart data. Modes: average (overlay all files), waterfall, peak (peak hold) and envelope (min/max/avg) use the first file only',
    inputSchema: {
      type: 'object',
      properties: {
        files: { type: 'array', items: { type: 'string' }, description: 'CSV file names in the data directory' },
        mode: { type: 'string', enum: MODES, description: 'Visualization mode (default: average)' },
        title: { type: 'string', description: 'Chart title' },
        bands: { type: 'string', description: 'Band allocation YAML file for hover annotations' },
      },
      required: ['files'],
    },
  },
  spectrum_subtract: {
    description: 'Subtract a baseline (noise floor) scan from a signal scan bin by bin',
    inputSchema: {
      type: 'object',
      properties: {
        signal: { type: 'string', description: 'Signal CSV file name' },
        baseline: { type: 'string', description: 'Baseline CSV file name' },
        output: { type: 'string', description: 'Optional CSV file name to save the result' },
        title: { type: 'string', description: 'Chart title' },
      },
      required: ['signal', 'baseline'],
    },
  },
  spectrum_export: {
    description: 'Re-export a CSV file as averaged 7-column rtl_power rows',
    inputSchema: {
      type: 'object',
      properties: {
        input: { type: 'string', description: 'Input CSV file name' },
        output: { type: 'string', description: 'Output CSV file name' },
      },
      required: ['input', 'output'],
    },
  },
  band_lookup: {
    description: 'Find the narrowest frequency allocation containing a frequency',
    inputSchema: {
      type: 'object',
      properties: {
        frequency: { type: 'number', description: 'Frequency in Hz' },
      },
      required: ['frequency'],
    },
  },
  scan_run: {
    description: 'Run a single rtl_power sweep on the server and return the averaged spectrum',
    inputSchema: {
      type: 'object',
      properties: {
        freq_start: { type: 'number', description: 'Start frequency in Hz' },
        freq_end: { type: 'number', description: 'End frequency in Hz' },
        step: { type: 'number', description: 'Frequency step in Hz' },
        integration: { type: 'number', description: 'Integration time in seconds' },
        gain: { type: 'number', description: 'Gain in dB, 0 for auto' },
        crop: { type: 'string', description: 'Crop percentage, e.g. 20%' },
        output: { type: 'string', description: 'Optional CSV file name to save the capture' },
      },
    },
  },
  scan_status: {
    description: 'Get the status of the current or last rtl_power scan',
    inputSchema: { type: 'object', properties: {} },
  },
  scan_stop: {
    description: 'Stop the running rtl_power scan',
    inputSchema: { type: 'object', properties: {} },
  },
  system_health: {
    description: 'Get server health, data directory and band table',
    inputSchema: { type: 'object', properties: {} },
  },
};

// ── Tool Implementations ──────────────────────────────────────────

function fileArgs(args: Record<string, unknown>): unknown {
  if (args.files !== undefined) return args.files;
  return args.file !== undefined ? [args.file] : undefined;
}

export async function handleTool(name: string, args: Record<string, unknown>, api: ApiCall): Promise<unknown> {
  switch (name) {
    case 'spectrum_files':
      return api('get', '/api/spectrum/files');
    case 'spectrum_view':
      return api('post', '/api/spectrum/view', {
        files: fileArgs(args), mode: args.mode, title: args.title, bands: args.bands,
      });
    case 'spectrum_subtract':
      return api('post', '/api/spectrum/subtract', {
        signal: args.signal, baseline: args.baseline, output: args.output, title: args.title,
      });
    case 'spectrum_export':
      return api('post', '/api/spectrum/export', { input: args.input, output: args.output });

    case 'band_lookup':
      return api('get', `/api/bands/lookup?frequency=${encodeURIComponent(String(args.frequency))}`);

    case 'scan_run':
      return api('post', '/api/scan/run', {
        config: {
          freqStart: args.freq_start,
          freqEnd: args.freq_end,
          step: args.step,
          integration: args.integration,
          gain: args.gain,
          crop: args.crop,
        },
        output: args.output,
      });
    case 'scan_status':
      return api('get', '/api/scan/status');
    case 'scan_stop':
      return api('post', '/api/scan/stop');

    case 'system_health':
      return api('get', '/api/health');

    default:
      return { error: 'unknown_tool', tool: name };
  }
}
