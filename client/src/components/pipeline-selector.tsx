import type { PipelineDescriptor, PipelineId } from "@shared/schema";

interface PipelineSelectorProps {
  pipelines: PipelineDescriptor[];
  selected: PipelineId[];
  onChange: (selected: PipelineId[]) => void;
}

/**
 * One checkbox per registered pipeline. Unavailable pipelines stay visible
 * with the reason, but cannot be chosen.
 */
export function PipelineSelector({ pipelines, selected, onChange }: PipelineSelectorProps) {
  const toggle = (id: PipelineId) => {
    const next = new Set(selected);
    if (next.has(id)) {
      next.delete(id);
    } else {
      next.add(id);
    }
    onChange(pipelines.filter((pipeline) => next.has(pipeline.id)).map((pipeline) => pipeline.id));
  };

  return (
    <fieldset className="flex flex-wrap items-center gap-4">
      <legend className="sr-only">Pipelines</legend>
      {pipelines.map((pipeline) => {
        const inputId = `pipeline-${pipeline.id}`;
        return (
          <div key={pipeline.id} className="flex items-center gap-2" data-available={pipeline.available}>
            <input
              id={inputId}
              type="checkbox"
              checked={selected.includes(pipeline.id)}
              disabled={!pipeline.available}
              onChange={() => toggle(pipeline.id)}
            />
            <label htmlFor={inputId} className={pipeline.available ? "" : "text-gray-500"}>
              {pipeline.id}
            </label>
            {!pipeline.available && pipeline.reason && (
              <span className="text-xs text-amber-400">{pipeline.reason}</span>
            )}
          </div>
        );
      })}
    </fieldset>
  );
}
