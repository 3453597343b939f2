// Prompts and personas for content coding

export const SYSTEM_PROMPTS = {
  textCoding: `You are a content analysis and coding expert, experienced with coding rules and coding schemes.
Code strictly according to the variable definitions and coding guides.
For categorical variables choose exactly one of the provided options and never create a new one.`,

  videoCoding: `You are a content analysis expert who assigns variable values based on video content.
Use the frame descriptions to give each variable a suitable coded value.
For categorical variables choose exactly one of the provided options and never create a new one.`,
};

export const FRAME_DESCRIPTION_PROMPT =
  'Describe the content of this video frame in detail, including the scene, people, activities and possible themes.';

export const DEFAULT_TEXT_TEMPLATE = `Code the following content for the listed variables.

Content:
{content}

Variables to code:
{variables}

Return the coding result as strict JSON, mapping each variable name to its value:
{
    "variable name 1": "value 1",
    "variable name 2": "value 2",
    ...
}

Important:
1. For categorical variables you must choose exactly one of the listed options. Do not create new options.
2. For Likert scale variables return an integer from 1 up to the number of points of that variable's scale.
3. Follow each variable's coding guide strictly.
4. Make sure every value fits the variable definition and the content.
`;

export const DEFAULT_VIDEO_TEMPLATE = `Code the following video description for the listed variables.

Video description:
{content}

Variables to code:
{variables}

Return the coding result as strict JSON, mapping each variable name to its value:
{
    "variable name 1": "value 1",
    "variable name 2": "value 2",
    ...
}

Important:
1. For categorical variables you must choose exactly one of the listed options. Do not create new options.
2. For Likert scale variables return an integer from 1 up to the number of points of that variable's scale.
3. Follow each variable's coding guide strictly.
4. Make sure every value fits the variable definition and the video content.
`;
