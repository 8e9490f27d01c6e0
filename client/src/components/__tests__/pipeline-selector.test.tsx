import { describe, it, expect, vi } from "vitest";
import { render, screen, fireEvent } from "@testing-library/react";
import type { PipelineDescriptor } from "@shared/schema";
import { PipelineSelector } from "../pipeline-selector";

const bothAvailable: PipelineDescriptor[] = [
  { id: "structural", available: true },
  { id: "ocr", available: true },
];

describe("PipelineSelector", () => {
  it("should render a checkbox per pipeline", () => {
    render(<PipelineSelector pipelines={bothAvailable} selected={["structural"]} onChange={vi.fn()} />);

    expect(screen.getByLabelText("structural")).toBeChecked();
    expect(screen.getByLabelText("ocr")).not.toBeChecked();
  });

  it("should disable unavailable pipelines and show why", () => {
    const pipelines: PipelineDescriptor[] = [
      { id: "structural", available: true },
      { id: "ocr", available: false, reason: "tesseract.js is not available on this server" },
    ];
    render(<PipelineSelector pipelines={pipelines} selected={[]} onChange={vi.fn()} />);

    expect(screen.getByLabelText("ocr")).toBeDisabled();
    expect(screen.getByText("tesseract.js is not available on this server")).toBeInTheDocument();
    expect(screen.getByLabelText("ocr").closest("[data-available]")).toHaveAttribute("data-available", "false");
  });

  it("should add a pipeline in listing order", () => {
    const onChange = vi.fn();
    render(<PipelineSelector pipelines={bothAvailable} selected={["ocr"]} onChange={onChange} />);

    fireEvent.click(screen.getByLabelText("structural"));

    expect(onChange).toHaveBeenCalledWith(["structural", "ocr"]);
  });

  it("should remove a checked pipeline", () => {
    const onChange = vi.fn();
    render(<PipelineSelector pipelines={bothAvailable} selected={["structural", "ocr"]} onChange={onChange} />);

    fireEvent.click(screen.getByLabelText("structural"));

    expect(onChange).toHaveBeenCalledWith(["ocr"]);
  });
});
