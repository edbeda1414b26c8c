import { useState, useCallback, useEffect, useMemo } from 'react';
import { FileUploader } from './components/file-uploader';
import { PolarizationChart } from './components/polarization-chart';
import { ControlPanel } from './components/control-panel';
import { DisplayOptions } from './components/display-options';
import { DEFAULT_SIMULATION_CONFIG } from './config';
import { buildChartData } from './lib/chart-data';
import { parseParameterFile } from './lib/parameter-parser';
import { formatBreakdownReport } from './lib/report';
import { analyzeFuelCell, type FuelCellAnalysis } from './math/fuel-cell-analysis';
import type { SimulationConfig } from './types';

type AnalysisState =
  | { analysis: FuelCellAnalysis; error: null }
  | { analysis: null; error: string };

const runAnalysis = (config: SimulationConfig): AnalysisState => {
  try {
    return { analysis: analyzeFuelCell(config), error: null };
  } catch (err) {
    return { analysis: null, error: err instanceof Error ? err.message : 'Simulation failed' };
  }
};

export function App() {
  const [config, setConfig] = useState<SimulationConfig>(DEFAULT_SIMULATION_CONFIG);
  const [fileError, setFileError] = useState<string>('');
  const [showVoltage, setShowVoltage] = useState(true);
  const [showPower, setShowPower] = useState(true);
  const [showLosses, setShowLosses] = useState(false);
  const [showMarkers, setShowMarkers] = useState(true);

  const { analysis, error } = useMemo(() => runAnalysis(config), [config]);
  const chartData = useMemo(() => (analysis ? buildChartData(analysis.curve) : []), [analysis]);

  useEffect(() => {
    if (analysis && analysis.warnings.length > 0) {
      console.warn('Simulation warnings:', analysis.warnings);
    }
  }, [analysis]);

  const handleFileLoad = useCallback((content: string) => {
    setFileError('');

    const parseResult = parseParameterFile(content);
    if (parseResult.error) {
      setFileError(parseResult.error);
      return;
    }

    setConfig(current => ({ ...current, ...parseResult.config }));

    if (parseResult.warnings.length > 0) {
      console.warn('Parameter file warnings:', parseResult.warnings);
    }
  }, []);

  const handleFileClear = useCallback(() => {
    setFileError('');
    setConfig(DEFAULT_SIMULATION_CONFIG);
  }, []);

  const op = analysis?.operatingPoint;

  return (
    <div className="min-h-screen bg-gray-50">
      <div className="container mx-auto px-4 py-4">
        <div className="grid grid-cols-1 lg:grid-cols-4 gap-4">
          {/* Left Sidebar - Controls */}
          <div className="lg:col-span-1 space-y-4">
            <FileUploader onFileLoad={handleFileLoad} onFileClear={handleFileClear} />
            <ControlPanel config={config} onConfigChange={setConfig} />
            <DisplayOptions
              showVoltage={showVoltage}
              showPower={showPower}
              showLosses={showLosses}
              showMarkers={showMarkers}
              onToggleVoltage={setShowVoltage}
              onTogglePower={setShowPower}
              onToggleLosses={setShowLosses}
              onToggleMarkers={setShowMarkers}
            />
          </div>

          {/* Main Content - Chart */}
          <div className="lg:col-span-3">
            {(error || fileError) && (
              <div className="mb-4 p-4 bg-red-50 border border-red-200 rounded-lg">
                {error && <p className="text-red-800">{error}</p>}
                {fileError && <p className="text-red-800">{fileError}</p>}
              </div>
            )}

            {analysis && op && (
              <>
                <PolarizationChart
                  data={chartData}
                  nernstVoltage={analysis.curve.nernstVoltage}
                  operatingPoint={op}
                  peakPower={analysis.peakPower}
                  title={`Fuel Cell Performance (T=${analysis.params.temperature} K, P=${analysis.params.hydrogenPressure} atm)`}
                  showVoltage={showVoltage}
                  showPower={showPower}
                  showLosses={showLosses}
                  showMarkers={showMarkers}
                  className="bg-white p-4 rounded-lg border border-gray-200"
                />

                <div className="mt-4 bg-white border border-gray-200 rounded-lg p-4">
                  <p className="text-sm font-semibold text-gray-800 mb-3">
                    Operating Point ({op.method === 'nearest' ? 'nearest sample' : 'interpolated'})
                  </p>
                  <div className="grid grid-cols-3 gap-4 text-center">
                    {[
                      { label: 'i', value: op.currentDensity.toFixed(3), unit: 'A/cm²' },
                      { label: 'V cell', value: op.cellVoltage.toFixed(4), unit: 'V' },
                      { label: 'P', value: op.powerDensity.toFixed(4), unit: 'W/cm²' },
                      { label: 'E Nernst', value: op.nernstVoltage.toFixed(4), unit: 'V' },
                      { label: 'Peak P', value: analysis.peakPower.powerDensity.toFixed(4), unit: 'W/cm²' },
                      { label: 'at i', value: analysis.peakPower.currentDensity.toFixed(3), unit: 'A/cm²' },
                      { label: 'Activation', value: (op.losses.activation * 1000).toFixed(1), unit: 'mV' },
                      { label: 'Ohmic', value: (op.losses.ohmic * 1000).toFixed(1), unit: 'mV' },
                      { label: 'Mass transport', value: (op.losses.concentration * 1000).toFixed(1), unit: 'mV' }
                    ].map(({ label, value, unit }) => (
                      <div key={label}>
                        <p className="text-xs text-gray-500 uppercase tracking-wide">{label}</p>
                        <p className="text-lg font-semibold text-gray-900">{value} <span className="text-xs font-normal text-gray-500">{unit}</span></p>
                      </div>
                    ))}
                  </div>
                </div>

                <div className="mt-4 bg-gray-50 border border-gray-200 rounded-lg p-4">
                  <p className="text-sm font-semibold text-gray-800 mb-3">Report</p>
                  <pre className="text-xs font-mono text-gray-700 whitespace-pre">
                    {formatBreakdownReport(analysis).join('\n')}
                  </pre>
                </div>
              </>
            )}
          </div>
        </div>
      </div>

      <div className="text-center py-3">
        <p className="text-[11px] text-gray-400">Steady-state single-cell model, all processing happens in your browser.</p>
      </div>
    </div>
  );
}

export default App;
