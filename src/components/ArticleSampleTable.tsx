import type { SampleRow } from '../types/articles';

type ArticleSampleTableProps = {
  rows: SampleRow[];
};

const ArticleSampleTable = ({ rows }: ArticleSampleTableProps) => {
  if (rows.length === 0) {
    return (
      <div className="chart-placeholder">
        <p>No articles match the current selection.</p>
      </div>
    );
  }

  return (
    <div className="table-wrap">
      <table className="data-table" aria-label="Sample of classified articles">
        <thead>
          <tr>
            <th>Language</th>
            <th>Code</th>
            <th>Type</th>
            <th>QID</th>
            <th>Article</th>
          </tr>
        </thead>
        <tbody>
          {rows.map((row, index) => (
            <tr key={`${row.languageCode}-${row.qid}-${index}`}>
              <td>{row.languageName}</td>
              <td>{row.languageCode}</td>
              <td>{row.category}</td>
              <td>{row.qid}</td>
              <td>
                <a href={row.articleUrl} target="_blank" rel="noopener noreferrer">
                  {row.articleUrl}
                </a>
              </td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
};

export default ArticleSampleTable;
