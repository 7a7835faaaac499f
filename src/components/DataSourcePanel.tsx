import type { ChangeEvent } from 'react';

interface Props {
  source: string | null;
  loading: boolean;
  error: string | null;
  onUpload: (file: File) => void;
  onReload: () => void;
}

const DataSourcePanel = ({ source, loading, error, onUpload, onReload }: Props) => {
  const handleChange = (e: ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    if (file) onUpload(file);
    e.target.value = '';
  };

  return (
    <div className="card stack">
      <div className="eyebrow">Data</div>
      {loading ? (
        <div className="muted">Loading workbook...</div>
      ) : source ? (
        <div>
          Using <strong>{source}</strong>
        </div>
      ) : (
        <div className="muted">No workbook loaded.</div>
      )}
      {error && (
        <div className="banner error" role="alert">
          {error}
        </div>
      )}
      <div className="form-row">
        <label className="button" htmlFor="workbook-upload">
          Upload workbook
        </label>
        <input
          id="workbook-upload"
          type="file"
          accept=".xlsx,.xls,.csv"
          style={{ display: 'none' }}
          onChange={handleChange}
        />
        <button className="button" onClick={onReload} disabled={loading}>
          Reload default file
        </button>
      </div>
    </div>
  );
};

export default DataSourcePanel;
