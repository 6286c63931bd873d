import {
  Bar,
  BarChart,
  CartesianGrid,
  Legend,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';
import { CATEGORY_COLORS, CHART_MODES } from '../constants';
import { capitalize, formatPercentage } from '../services/categoryPresenter';
import type { ArticleCategory, ChartMode, ChartSeriesRow } from '../types/articles';

type CategoryChartProps = {
  mode: ChartMode;
  categories: ArticleCategory[];
  data: ChartSeriesRow[];
};

const formatTooltipValue = (mode: ChartMode) => (value: unknown) => {
  const numeric = typeof value === 'number' || typeof value === 'string' ? Number(value) : Number.NaN;
  if (!Number.isFinite(numeric)) {
    return 'N/A';
  }
  return mode === 'stacked-count' ? numeric.toLocaleString() : formatPercentage(numeric);
};

const CategoryChart = ({ mode, categories, data }: CategoryChartProps) => {
  const settings = CHART_MODES[mode];

  return (
    <article className="chart-card" aria-label={settings.title}>
      <div className="chart-header">
        <p className="panel-label">{settings.title}</p>
      </div>
      {data.length === 0 ? (
        <div className="chart-placeholder">
          <p>No languages to plot.</p>
        </div>
      ) : (
        <ResponsiveContainer width="100%" height={600}>
          <BarChart data={data} margin={{ top: 10, right: 16, left: 4, bottom: 72 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#d5dae1" />
            <XAxis
              dataKey="languageLabel"
              interval={0}
              tick={{ fontSize: 11 }}
              angle={-35}
              textAnchor="end"
              height={96}
            />
            <YAxis
              width={78}
              tick={{ fontSize: 11 }}
              domain={settings.yDomain ?? [0, 'auto']}
              label={{ value: settings.yLabel, angle: -90, position: 'insideLeft' }}
            />
            <Tooltip formatter={formatTooltipValue(mode)} />
            <Legend
              wrapperStyle={{ fontSize: 12 }}
              layout="vertical"
              verticalAlign="top"
              align="right"
              formatter={(value: string) => capitalize(value)}
            />
            {categories.map((category) => (
              <Bar
                key={category}
                dataKey={category}
                name={category}
                fill={CATEGORY_COLORS[category]}
                stackId={settings.stacked ? 'categories' : undefined}
              />
            ))}
          </BarChart>
        </ResponsiveContainer>
      )}
    </article>
  );
};

export default CategoryChart;
