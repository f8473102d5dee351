// pdf-poppler ships no type declarations
declare module 'pdf-poppler' {
  export interface ConvertOptions {
    format: 'png' | 'jpeg' | 'tiff' | 'pdf' | 'ps' | 'eps' | 'svg';
    out_dir: string;
    out_prefix: string;
    page?: number | null;
    scale?: number;
  }

  const poppler: {
    convert(file: string, options: ConvertOptions): Promise<unknown>;
  };

  export default poppler;
}
