import { useForm } from "react-hook-form";
import { zodResolver } from "@hookform/resolvers/zod";
import { Button, Form, Spinner } from "react-bootstrap";
import { DEFAULT_HISTOGRAM_BUCKETS, MAX_HISTOGRAM_BUCKETS } from "../../constants.js";
import { analyzeFormSchema, type AnalyzeFormData } from "../../types/stats.js";

interface GradeInputFormProps {
  onSubmit: (data: AnalyzeFormData) => Promise<void>;
  disabled?: boolean;
}

export default function GradeInputForm({ onSubmit, disabled }: GradeInputFormProps) {
  const {
    register,
    handleSubmit,
    formState: { errors, isSubmitting },
  } = useForm<AnalyzeFormData>({
    resolver: zodResolver(analyzeFormSchema),
    defaultValues: {
      grades: "",
      buckets: DEFAULT_HISTOGRAM_BUCKETS,
    },
    disabled,
  });

  return (
    <Form onSubmit={handleSubmit(onSubmit)} noValidate>
      <Form.Group className="mb-3" controlId="grades">
        <Form.Label>Grades</Form.Label>
        <Form.Control
          as="textarea"
          rows={4}
          placeholder="85, 92, 78, 88, 95"
          {...register("grades")}
          isInvalid={!!errors.grades}
          autoFocus
        />
        <Form.Text muted>Separate grades with commas.</Form.Text>
        <Form.Control.Feedback type="invalid">
          {errors.grades?.message}
        </Form.Control.Feedback>
      </Form.Group>
      <Form.Group className="mb-3" controlId="buckets">
        <Form.Label>Histogram buckets</Form.Label>
        <Form.Control
          type="number"
          min={1}
          max={MAX_HISTOGRAM_BUCKETS}
          {...register("buckets")}
          isInvalid={!!errors.buckets}
        />
        <Form.Control.Feedback type="invalid">
          {errors.buckets?.message}
        </Form.Control.Feedback>
      </Form.Group>
      <Button type="submit" variant="primary" disabled={disabled || isSubmitting}>
        {isSubmitting && (
          <Spinner animation="border" size="sm" role="status" className="me-2" />
        )}
        Analyze
      </Button>
    </Form>
  );
}
