import { BaseLogger } from 'pino';
import { TemplateLoadError, UnsupportedRuntimeError } from '../errors';
import { discoverFunctions } from '../function-discovery';
import { loadTemplate } from '../template-model';
import { fakeLogger } from './fakes';

function template(resources: string, globals = ''): string {
  return `${globals}Resources:\n${resources}`;
}

describe('function-discovery', () => {
  afterEach(() => {
    jest.clearAllMocks();
  });

  it('describes each function resource in declaration order', () => {
    // Arrange
    const doc = loadTemplate(
      template(`  Zeta:
    Type: AWS::Serverless::Function
    Properties:
      CodeUri: zeta/
      Runtime: python3.11
  Table:
    Type: AWS::DynamoDB::Table
  Alpha:
    Type: AWS::Serverless::Function
    Properties:
      CodeUri: ./src/alpha
      Runtime: python3.8
`),
    );

    // Act
    const result = discoverFunctions(doc, '/templates/app');

    // Assert
    expect(
      result.map(({ name, codeUri, sourceDir, runtime }) => ({
        name,
        codeUri,
        sourceDir,
        runtime,
      })),
    ).toEqual([
      {
        name: 'Zeta',
        codeUri: 'zeta/',
        sourceDir: '/templates/app/zeta',
        runtime: 'python3.11',
      },
      {
        name: 'Alpha',
        codeUri: './src/alpha',
        sourceDir: '/templates/app/src/alpha',
        runtime: 'python3.8',
      },
    ]);
    expect(result[0].tools.family).toBe('python');
  });

  it('returns nothing for a template without functions', () => {
    const doc = loadTemplate(
      template(`  Table:
    Type: AWS::DynamoDB::Table
`),
    );

    expect(discoverFunctions(doc, '/templates')).toEqual([]);
  });

  it('falls back to Globals for the runtime and code location', () => {
    // Arrange
    const doc = loadTemplate(
      template(
        `  Worker:
    Type: AWS::Serverless::Function
    Properties:
      Handler: worker.main
`,
        `Globals:
  Function:
    Runtime: python3.10
    CodeUri: shared/
`,
      ),
    );

    // Act
    const [worker] = discoverFunctions(doc, '/templates');

    // Assert
    expect(worker.runtime).toBe('python3.10');
    expect(worker.sourceDir).toBe('/templates/shared');
  });

  it('aborts when any function declares a foreign runtime', () => {
    // Arrange
    const doc = loadTemplate(
      template(`  PyFunction:
    Type: AWS::Serverless::Function
    Properties:
      CodeUri: py/
      Runtime: python3.8
  NodeFunction:
    Type: AWS::Serverless::Function
    Properties:
      CodeUri: node/
      Runtime: nodejs18.x
`),
    );

    // Act & Assert
    expect(() => discoverFunctions(doc, '/templates')).toThrow(
      new UnsupportedRuntimeError('NodeFunction', 'nodejs18.x'),
    );
  });

  it('aborts on an unsupported python variant', () => {
    const doc = loadTemplate(
      template(`  Legacy:
    Type: AWS::Serverless::Function
    Properties:
      CodeUri: legacy/
      Runtime: python2.7
`),
    );

    expect(() => discoverFunctions(doc, '/templates')).toThrow(
      'Function "Legacy" uses unsupported runtime "python2.7".',
    );
  });

  it('aborts when a function has no runtime at all', () => {
    const doc = loadTemplate(
      template(`  Bare:
    Type: AWS::Serverless::Function
    Properties:
      CodeUri: bare/
`),
    );

    expect(() => discoverFunctions(doc, '/templates')).toThrow(
      'Function "Bare" does not declare a runtime.',
    );
  });

  it('rejects a runtime that is not a string', () => {
    const doc = loadTemplate(
      template(`  Odd:
    Type: AWS::Serverless::Function
    Properties:
      CodeUri: odd/
      Runtime:
        Ref: RuntimeParameter
`),
    );

    expect(() => discoverFunctions(doc, '/templates')).toThrow(
      TemplateLoadError,
    );
  });

  it('rejects a function without a code location', () => {
    const doc = loadTemplate(
      template(`  NoCode:
    Type: AWS::Serverless::Function
    Properties:
      Runtime: python3.9
`),
    );

    expect(() => discoverFunctions(doc, '/templates')).toThrow(
      'Function "NoCode" does not declare a CodeUri.',
    );
  });

  it('skips functions whose code is already remote', () => {
    // Arrange
    const doc = loadTemplate(
      template(`  Uploaded:
    Type: AWS::Serverless::Function
    Properties:
      CodeUri: s3://bucket/key.zip
      Runtime: python3.9
  Mapped:
    Type: AWS::Serverless::Function
    Properties:
      CodeUri:
        Bucket: bucket
        Key: key.zip
      Runtime: python3.9
  Local:
    Type: AWS::Serverless::Function
    Properties:
      CodeUri: local/
      Runtime: python3.9
`),
    );

    // Act
    const result = discoverFunctions(
      doc,
      '/templates',
      fakeLogger as unknown as BaseLogger,
    );

    // Assert
    expect(result.map((fn) => fn.name)).toEqual(['Local']);
    expect(fakeLogger.info).toHaveBeenCalledTimes(2);
  });
});
