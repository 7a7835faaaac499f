import type { FinancialRecord } from '../domain/dataset';
import type { FinancialField } from '../domain/enums';
import { formatCell } from '../utils/formatters';

interface Props {
  records: FinancialRecord[];
  fields: FinancialField[];
  selectedBank: string;
}

const KeyFinancialsTable = ({ records, fields, selectedBank }: Props) => (
  <div className="card">
    <h3>Key Financials – Peer Comparison</h3>
    <div className="table-scroll">
      <table className="data-table">
        <thead>
          <tr>
            <th>Bank</th>
            {fields.map((f) => (
              <th key={f} className="numeric">
                {f}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {records.map((r) => (
            <tr key={r.bank} className={r.bank === selectedBank ? 'selected' : undefined}>
              <td>{r.bank}</td>
              {fields.map((f) => (
                <td key={f} className="numeric">
                  {formatCell(r.cells[f])}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  </div>
);

export default KeyFinancialsTable;
