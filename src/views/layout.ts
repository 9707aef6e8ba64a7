import validator from 'validator';

export const escape = (value: string): string => validator.escape(value);

export const layout = (title: string, body: string): string => `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>${escape(title)}</title>
</head>
<body>
${body}
</body>
</html>
`;
