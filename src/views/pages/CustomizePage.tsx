/**
 * Recommendation settings form. Each audio feature has an on/off checkbox
 * (`<feature>_enabled`) and a range input (`<feature>`); the browser script
 * mirrors the range value into the adjacent `<output>`.
 */
import Layout from "../components/Layout";
import type { FlashMessage } from "../../shared/types";
import {
  AUDIO_FEATURES,
  FEATURE_RANGES,
  TIME_RANGES,
  TIME_RANGE_LABELS,
  type RecommendationSettings,
} from "../../shared/validators/recommendations";

export interface CustomizePageProps {
  userEmail: string | null;
  flash?: FlashMessage;
  settings: RecommendationSettings;
  error?: string;
}

export default function CustomizePage({ userEmail, flash, settings, error }: CustomizePageProps) {
  return (
    <Layout title="Customize" userEmail={userEmail} flash={flash}>
      <h1>Customize recommendations</h1>
      <form method="post" action="/customize" className="card settings-form">
        {error && (
          <p className="form-error" role="alert">
            {error}
          </p>
        )}

        <label htmlFor="timeRange">Seed tracks from</label>
        <select id="timeRange" name="timeRange" defaultValue={settings.timeRange}>
          {TIME_RANGES.map((range) => (
            <option key={range} value={range}>
              {TIME_RANGE_LABELS[range]}
            </option>
          ))}
        </select>

        {AUDIO_FEATURES.map((feature) => {
          const range = FEATURE_RANGES[feature];
          const setting = settings.features[feature];
          return (
            <fieldset key={feature} className="feature">
              <legend>{range.label}</legend>
              <label>
                <input type="checkbox" name={`${feature}_enabled`} defaultChecked={setting.enabled} /> Use
                target
              </label>
              <input
                type="range"
                id={feature}
                name={feature}
                min={range.min}
                max={range.max}
                step={range.step}
                defaultValue={setting.target}
                aria-label={`${range.label} target`}
              />
              <output htmlFor={feature} data-output-for={feature}>
                {setting.target}
              </output>
            </fieldset>
          );
        })}

        <div className="actions">
          <button type="submit" className="button">
            Save settings
          </button>
          <button type="submit" name="reset" value="1" className="button button-secondary" formNoValidate>
            Reset to defaults
          </button>
        </div>
      </form>
    </Layout>
  );
}
