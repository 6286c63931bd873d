import { capitalize, formatPercentage } from '../services/categoryPresenter';
import type { ArticleCategory, BreakdownRow } from '../types/articles';

type BreakdownTablesProps = {
  categories: ArticleCategory[];
  countRows: BreakdownRow[];
  percentageRows: BreakdownRow[];
};

const BreakdownTables = ({ categories, countRows, percentageRows }: BreakdownTablesProps) => (
  <div className="breakdown-tables">
    <h3>Articles by Language and Type</h3>
    <div className="table-wrap">
      <table className="data-table" aria-label="Article counts by language">
        <thead>
          <tr>
            <th>Language</th>
            {categories.map((category) => (
              <th key={category}>{capitalize(category)}</th>
            ))}
            <th>Total</th>
          </tr>
        </thead>
        <tbody>
          {countRows.map((row) => (
            <tr key={`count-${row.languageCode}`}>
              <td>{row.label}</td>
              {categories.map((category) => (
                <td key={`${row.languageCode}-${category}`}>{(row.values[category] ?? 0).toLocaleString()}</td>
              ))}
              <td>{row.total.toLocaleString()}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>

    <h3>Percentage Distribution</h3>
    <div className="table-wrap">
      <table className="data-table" aria-label="Article percentages by language">
        <thead>
          <tr>
            <th>Language</th>
            {categories.map((category) => (
              <th key={category}>{capitalize(category)}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {percentageRows.map((row) => (
            <tr key={`pct-${row.languageCode}`}>
              <td>{row.label}</td>
              {categories.map((category) => (
                <td key={`${row.languageCode}-${category}`}>{formatPercentage(row.values[category] ?? 0)}</td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  </div>
);

export default BreakdownTables;
