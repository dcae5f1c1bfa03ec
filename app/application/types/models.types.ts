export interface ModelResponseData {
  object: 'model';
  id: string;
  created: number;
  owned_by: string;
}

export interface ModelResponse {
  object: 'list';
  data: ModelResponseData[];
}
