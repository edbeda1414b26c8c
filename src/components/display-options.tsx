import React from 'react';
import { Spline, Zap, Layers, MapPin } from 'lucide-react';
import { Card } from './ui/card';
import { Button } from './ui/button';
import { Label } from './ui/label';

export interface DisplayOptionsProps {
  showVoltage: boolean;
  showPower: boolean;
  showLosses: boolean;
  showMarkers: boolean;
  onToggleVoltage: (show: boolean) => void;
  onTogglePower: (show: boolean) => void;
  onToggleLosses: (show: boolean) => void;
  onToggleMarkers: (show: boolean) => void;
  className?: string;
}

export const DisplayOptions: React.FC<DisplayOptionsProps> = ({
  showVoltage,
  showPower,
  showLosses,
  showMarkers,
  onToggleVoltage,
  onTogglePower,
  onToggleLosses,
  onToggleMarkers,
  className = ""
}) => {
  const dataLayers = [
    { key: 'voltage', label: 'Voltage', icon: Spline, color: '#1f77b4', isShown: showVoltage, onToggle: onToggleVoltage },
    { key: 'power', label: 'Power', icon: Zap, color: '#ff7f0e', isShown: showPower, onToggle: onTogglePower },
    { key: 'losses', label: 'Losses', icon: Layers, color: '#10b981', isShown: showLosses, onToggle: onToggleLosses },
    { key: 'markers', label: 'Markers', icon: MapPin, color: '#a855f7', isShown: showMarkers, onToggle: onToggleMarkers },
  ];

  return (
    <Card className={`p-4 ${className}`}>
      <div className="space-y-4">
        <h3 className="text-sm font-semibold text-gray-800">Display</h3>

        {/* Curve layers: icon toggle buttons */}
        <div className="space-y-2">
          <Label className="text-xs font-medium text-gray-500 uppercase tracking-wide">Curves</Label>
          <div className="flex flex-wrap gap-1.5">
            {dataLayers.map((layer) => {
              const Icon = layer.icon;
              return (
                <Button
                  key={layer.key}
                  variant="outline"
                  size="sm"
                  aria-pressed={layer.isShown}
                  onClick={() => layer.onToggle(!layer.isShown)}
                  className="h-8 px-2.5 gap-1.5"
                  style={layer.isShown ? { borderColor: layer.color, color: layer.color, backgroundColor: `${layer.color}10` } : {}}
                >
                  <Icon className="w-3.5 h-3.5" />
                  <span className="text-xs">{layer.label}</span>
                </Button>
              );
            })}
          </div>
        </div>
      </div>
    </Card>
  );
};

export default DisplayOptions;
