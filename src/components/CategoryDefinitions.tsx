import { CATEGORY_DEFINITIONS } from '../constants';
import { capitalize } from '../services/categoryPresenter';
import type { ArticleCategory } from '../types/articles';

const CategoryDefinitions = ({ categories }: { categories: readonly ArticleCategory[] }) => (
  <dl className="category-definitions">
    {categories.map((category) => (
      <div key={category} className="category-definition">
        <dt>{capitalize(category)}</dt>
        <dd>{CATEGORY_DEFINITIONS[category]}</dd>
      </div>
    ))}
  </dl>
);

export default CategoryDefinitions;
