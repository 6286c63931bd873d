import CategoryDefinitions from '../components/CategoryDefinitions';
import { CATEGORY_ORDER, LANGUAGE_NAMES, TOP_LANGUAGE_LIMIT } from '../constants';

const AboutPage = () => (
  <div className="page-scroll">
    <div className="page-grid about-page">
      <header className="page-header">
        <h1>About the Data</h1>
      </header>

      <section className="panel">
        <p className="panel-label">Research Question</p>
        <p>
          How does the distribution of article types (humans, events, organizations, concepts) vary across
          the top {TOP_LANGUAGE_LIMIT} Wikipedia language editions?
        </p>
      </section>

      <section className="panel">
        <p className="panel-label">Data Description</p>
        <p>
          The dataset contains climate change related articles from WikiProject Climate Change. Each article
          was classified using Wikidata's "instance of" (P31) property together with its broader subclass
          hierarchy.
        </p>
        <p>
          Articles were queried from Wikidata, classified using P31 instance types expanded with P279
          subclass hierarchies, and merged with Wikipedia article URLs across the language editions below.
          Following the subclass hierarchy catches items such as NGOs that a direct P31 match files under
          "other".
        </p>
      </section>

      <section className="panel">
        <p className="panel-label">How Articles Were Classified</p>
        <CategoryDefinitions categories={CATEGORY_ORDER} />
      </section>

      <section className="panel">
        <p className="panel-label">Language Editions</p>
        <ul className="language-list">
          {Object.entries(LANGUAGE_NAMES).map(([code, name]) => (
            <li key={code}>
              {name} ({code})
            </li>
          ))}
        </ul>
      </section>
    </div>
  </div>
);

export default AboutPage;
