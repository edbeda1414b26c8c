import React, { useCallback, useState } from 'react';
import { Upload, FileText, X } from 'lucide-react';
import { Button } from './ui/button';
import { Card } from './ui/card';

interface FileUploaderProps {
  onFileLoad: (content: string, fileName: string) => void;
  onFileClear?: () => void;
}

const ACCEPTED_EXTENSIONS = ['.txt', '.cfg', '.csv'];

const isAcceptedFile = (name: string): boolean =>
  ACCEPTED_EXTENSIONS.some(ext => name.toLowerCase().endsWith(ext));

export const FileUploader: React.FC<FileUploaderProps> = ({ onFileLoad, onFileClear }) => {
  const [isDragging, setIsDragging] = useState(false);
  const [loadedFileName, setLoadedFileName] = useState<string | null>(null);
  const [readError, setReadError] = useState<string | null>(null);

  const readFile = useCallback((file: File) => {
    setReadError(null);

    const reader = new FileReader();
    reader.onload = () => {
      const content = typeof reader.result === 'string' ? reader.result : '';
      if (content.trim()) {
        setLoadedFileName(file.name);
        onFileLoad(content, file.name);
      } else {
        setReadError('File appears to be empty');
      }
    };
    reader.onerror = () => {
      setReadError('Error reading file');
    };
    reader.readAsText(file);
  }, [onFileLoad]);

  const handleDragOver = useCallback((e: React.DragEvent) => {
    e.preventDefault();
    setIsDragging(true);
  }, []);

  const handleDragLeave = useCallback((e: React.DragEvent) => {
    e.preventDefault();
    setIsDragging(false);
  }, []);

  const handleDrop = useCallback((e: React.DragEvent) => {
    e.preventDefault();
    setIsDragging(false);

    const file = Array.from(e.dataTransfer.files)[0];

    if (file && isAcceptedFile(file.name)) {
      readFile(file);
    } else {
      setReadError(`Please upload a ${ACCEPTED_EXTENSIONS.join(', ')} file`);
    }
  }, [readFile]);

  const handleFileSelect = useCallback((e: React.ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    if (file) {
      readFile(file);
    }
  }, [readFile]);

  const clearFile = () => {
    setLoadedFileName(null);
    onFileClear?.();
  };

  return (
    <Card className="p-4">
      <div className="space-y-3">
        <div className="flex items-center gap-2">
          <Upload className="w-4 h-4" />
          <h3 className="text-sm font-semibold text-gray-800">Parameter File</h3>
        </div>

        {!loadedFileName ? (
          <div
            className={`border-2 border-dashed rounded-lg p-4 text-center transition-colors ${
              isDragging
                ? 'border-blue-500 bg-blue-50'
                : 'border-gray-300 hover:border-gray-400'
            }`}
            onDragOver={handleDragOver}
            onDragLeave={handleDragLeave}
            onDrop={handleDrop}
          >
            <FileText className="w-8 h-8 mx-auto mb-2 text-gray-400" />
            <p className="text-xs text-gray-600 mb-2">
              Drop a parameter file here
            </p>
            <div className="text-[10px] text-gray-400 bg-gray-50 p-2 rounded-md text-left mb-2 font-mono">
              <p>T = 80 °C</p>
              <p>P_H2 = 3.0</p>
              <p>P_O2 = 3.0</p>
              <p>alpha = 0.5</p>
            </div>
            <input
              type="file"
              accept={ACCEPTED_EXTENSIONS.join(',')}
              onChange={handleFileSelect}
              className="hidden"
              id="parameter-file-input"
            />
            <Button asChild variant="outline" size="sm">
              <label htmlFor="parameter-file-input" className="cursor-pointer">
                Browse Files
              </label>
            </Button>
            {readError && <p className="text-xs text-red-600 mt-2">{readError}</p>}
          </div>
        ) : (
          <div className="flex items-center justify-between p-3 bg-green-50 border border-green-200 rounded-lg">
            <div className="flex items-center gap-2">
              <FileText className="w-4 h-4 text-green-600" />
              <span className="text-sm text-green-800 font-medium">{loadedFileName}</span>
            </div>
            <Button
              variant="ghost"
              size="sm"
              onClick={clearFile}
              className="text-green-600 hover:text-green-800"
            >
              <X className="w-4 h-4" />
            </Button>
          </div>
        )}
      </div>
    </Card>
  );
};
