import RouteFinder from "@/components/RouteFinder";
import { getConfigStatus } from "@/lib/config";
import { PLACE_CATEGORIES, PLACE_CATEGORY_KEYS } from "@/lib/places";
import { userMessageFor } from "@/lib/presenter";
import { SUPPORTED_LANGUAGES } from "@/lib/translator";

export const dynamic = "force-dynamic";

const categories = PLACE_CATEGORY_KEYS.map((key) => ({ key, label: PLACE_CATEGORIES[key].label }));

export default function HomePage() {
  const status = getConfigStatus();

  return (
    <main className="page-shell">
      <section className="panel panel-subtle">
        <div className="heading-row">
          <div>
            <h1>Route Lens</h1>
            <p className="panel-subtitle">
              Upload a photo, use your camera or type a request like &ldquo;Pune to Mumbai by car&rdquo; to get turn-by-turn
              directions.
            </p>
          </div>
        </div>
      </section>

      {status.ok ? (
        <RouteFinder languages={SUPPORTED_LANGUAGES} categories={categories} />
      ) : (
        <section className="panel">
          <div className="error-banner" role="alert">
            <strong>Configuration missing.</strong> {userMessageFor("ConfigurationMissing")}
            <ul>
              {status.problems.map((problem) => (
                <li key={problem}>{problem}</li>
              ))}
            </ul>
          </div>
        </section>
      )}
    </main>
  );
}
